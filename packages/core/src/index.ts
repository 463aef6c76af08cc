/**
 * @fileoverview Core types, queues and the strict-priority manager for tierq
 * @version 0.1.0
 */

// Task System Types
export * from './types/task.js';

// Priority-class queues
export * from './queue/class-queue.js';
export * from './manager/priority-manager.js';

// Error Handling and Validation
export * from './types/errors.js';
export * from './validation/schemas.js';

// Utility Types
export * from './types/common.js';
export * from './utils/preview.js';
