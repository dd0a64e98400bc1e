// Central export for all type definitions

// Re-export configuration types
export * from '../config/types.js';

// Re-export API types
export * from './api.js';

// Re-export order types
export * from './order.js';

// Re-export token types
export * from './token.js';
