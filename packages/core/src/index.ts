export const name = '@typecensus/core';

export * from './version/pep440';
export * from './selection';
export * from './markers';
export * from './resolver';
export * from './config/loader';
