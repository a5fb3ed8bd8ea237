export * from './listing.types';
export * from './errors';
