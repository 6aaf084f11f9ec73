// Re-export all schema tables for use by the db module.
export * from './user.js';
export * from './file.js';
export * from './bundle.js';
export * from './setting.js';
