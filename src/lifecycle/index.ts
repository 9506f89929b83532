export * from './states.js';
export * from './change-id.js';
export * from './scaffold.js';
export * from './lifecycle.js';
