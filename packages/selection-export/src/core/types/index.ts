export type * from './dataset.js';
export type * from './engine.js';
export { STATISTIC_FUNCTIONS } from './engine.js';
