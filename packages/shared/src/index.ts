// Types
export * from './types/answer.js';
export * from './types/api.js';
export * from './types/codebase.js';
export * from './types/diff.js';
export * from './types/review.js';
export * from './types/sse-events.js';
export * from './types/trace.js';

// Errors
export * from './errors.js';

// Utils
export * from './utils/answer-blocks.js';
export * from './utils/citations.js';
export * from './utils/format.js';
export * from './utils/id.js';
