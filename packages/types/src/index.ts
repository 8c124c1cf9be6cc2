// Types
export * from './types/index.js';

// Zod schemas
export * from './schemas/index.js';

// Error classes
export * from './errors.js';

// Pure utils (constants, dates, text)
export * from './utils/index.js';
