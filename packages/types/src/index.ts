// Domain types
export * from './types/index.js';

// Zod schemas
export * from './schemas/index.js';

// Validation (AJV + balance checks)
export * from './validation/index.js';

// Pure utils (date, money, constants)
export * from './utils/index.js';

// Errors
export * from './errors.js';
