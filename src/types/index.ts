export * from './audit.js';
export * from './intent.js';
export * from './plan.js';
export * from './policy.js';
export * from './request.js';
export * from './response.js';
export * from './schema.js';
