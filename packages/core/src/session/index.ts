export * from './state.js';
export * from './codec.js';
export * from './transitions.js';
