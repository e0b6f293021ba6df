// Loads .env before anything reads process.env
export * from './global-env';
export * from './errorHandler';
export * from './configLoader';

export { default as logger } from './logger';
export { default } from './logger';
