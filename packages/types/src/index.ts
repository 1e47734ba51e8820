// Types
export * from './types/index.js';

// Zod schemas
export * from './schemas/index.js';

// Validation (balance equation + AJV)
export * from './validation/index.js';

// Pure utils (date, money, constants)
export * from './utils/index.js';
