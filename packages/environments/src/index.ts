// Environments package - micromamba-backed Python environment management

export * from './types';
export * from './errors';
export * from './logger';
export * from './config';
export * from './command-runner';
export * from './micromamba';
