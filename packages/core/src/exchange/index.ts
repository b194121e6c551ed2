export { evaluateExchange, seeAfterMove } from './see.js';
