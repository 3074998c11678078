export * from './core';
export * from './utils';
export * from './config/constants';
