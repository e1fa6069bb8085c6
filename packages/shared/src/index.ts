// Constants
export * from './constants/api.js';
export * from './constants/error-codes.js';
export * from './constants/models.js';

// Schemas
export * from './schemas/chat.schema.js';
export * from './schemas/credential.schema.js';

// Types
export type * from './types/openai.js';
