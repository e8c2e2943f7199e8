export * from './release';
export * from './artifact';
