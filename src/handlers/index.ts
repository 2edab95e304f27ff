export * from './core.js';
export * from './session.js';
