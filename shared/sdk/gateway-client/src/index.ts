export * from './client';
export * from './config';
export * from './contract';
export * from './errors';
export * from './logger';
export * from './session';
export * from './transports';
export * from './types';
