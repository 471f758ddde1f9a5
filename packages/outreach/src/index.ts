export * from './pipeline.js';
export * from './profile.js';
