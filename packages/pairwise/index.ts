export * from './src/catalog';
export * from './src/clock';
export * from './src/collector';
export * from './src/config';
export * from './src/counterbalance';
export * from './src/csv';
export * from './src/eye-tracker';
export * from './src/files';
export * from './src/ordering';
export * from './src/result';
export * from './src/screens';
export * from './src/sequencer';
export * from './src/session';
export * from './src/session-logger';
export * from './src/summary';
export * from './src/trial';
export * from './src/trial-store';
export type * from './types';
