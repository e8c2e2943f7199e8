export const name = '@typecensus/shared';

export * from './types/events';
export * from './types/records';
export * from './logger';
export * from './redaction';
export * from './errors';
export * from './names';
export * from './config/schema';
