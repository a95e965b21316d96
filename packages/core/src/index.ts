export * from './types';
export * from './schemas';
export * from './errors';
export * from './config';
export * from './logger';
export * from './utils/values';
