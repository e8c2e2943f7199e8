export const name = '@typecensus/index-client';

export * from './types';
export * from './package-index';
export * from './common';
export * from './archive';
export * from './pypi';
export * from './pypi/schema';
export * from './fake';
