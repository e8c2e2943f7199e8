export * from './types';
export * from './resolver';
