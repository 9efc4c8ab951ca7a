/**
 * textblocks core types
 */
export * from './block';
export * from './document';
