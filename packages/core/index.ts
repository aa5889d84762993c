export { EventEmitter } from './src/event-emitter';
export * from './src/random';
export type * from './types';
