export { BoardPool, DEFAULT_POOL_SIZE } from './board-pool.js';
export type { BoardPoolStats, BoardPoolOptions } from './board-pool.js';
