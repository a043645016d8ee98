export type * from './action-record.js';
export type * from './summary.js';
export type * from './action-ref.js';
