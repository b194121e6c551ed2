export { convertPvToSan, tryConvertPvToSan, isUciMove } from './pv-notation.js';

export { renderBoard } from './board-visualizer.js';
export type { Perspective, BoardRenderOptions } from './board-visualizer.js';
