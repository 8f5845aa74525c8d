// Zod schemas and inferred record types
export * from './schemas/index.js';

// Error taxonomy
export * from './errors.js';

// Pure utils (date, money, constants)
export * from './utils/index.js';
