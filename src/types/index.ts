// User types
export * from './user.js';

// Token types
export * from './token.js';

// Chirp types
export * from './chirp.js';

// Hono context types
export * from './hono.js';
