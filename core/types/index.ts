export * from './location';
export * from './values';
export * from './tokens';
export * from './nodes';
