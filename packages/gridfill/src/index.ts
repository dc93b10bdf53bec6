export * from './engine';
export * from './session';
export * from './adapters';
export * from './config';
export * from './monitoring';
export * from './errors';
export { prepareValue, valuesMatch } from './lib/values';
export { pollUntil, sleep } from './lib/timing';
