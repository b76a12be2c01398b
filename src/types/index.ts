export * from './scan.js';
export * from './api.js';
