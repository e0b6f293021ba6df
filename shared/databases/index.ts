/**
 * Database Exports
 */

export * from './postgres';
