export * from './base';
export * from './core-auth';
export * from './certificates';
export * from './config';
export * from './schemas';
export * from './types';
