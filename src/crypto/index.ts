export * from './hash.js';
export * from './jwt.js';
export * from './random.js';
