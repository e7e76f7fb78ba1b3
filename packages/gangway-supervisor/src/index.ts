export * from './types';
export * from './errors';
export * from './state';
export * from './logger';
export * from './launcher';
export * from './health';
export * from './config';
export * from './supervisor';
