/**
 * Utils Module
 *
 * Re-exports all utility functions for easy importing.
 */

export * from './banner';
export * from './colors';
export * from './logger';
export * from './startup';
