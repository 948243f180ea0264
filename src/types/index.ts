export * from './config.js';
export * from './models.js';
export * from './image-generation.js';
