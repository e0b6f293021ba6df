export * from './client';
export * from './connection';
export * from './connectionGuard';
export * from './errors';
export * from './persistentLoop';
export * from './rows';
export * from './runtime';
