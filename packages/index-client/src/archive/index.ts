export * from './format';
export * from './zip';
export * from './tar';
export * from './range-reader';
