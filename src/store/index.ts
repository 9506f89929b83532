export * from './document-store.js';
export * from './lock.js';
export * from './context.js';
