// Type definitions
export * from './types';

// Catalog lookups
export * from './catalog-queries';
export * from './catalog-gateway';
