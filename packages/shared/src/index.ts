export * from './constants/index.js';
export * from './types/api.js';
export * from './types/auth.js';
export * from './types/file.js';
export * from './types/bundle.js';
export * from './types/settings.js';
export * from './types/dashboard.js';
export * from './validation/auth.js';
export * from './validation/file.js';
export * from './validation/bundle.js';
