export const name = '@pplaces/repo';

export * from './types';
export * from './scanner';
export * from './git';
export * from './inspector';
export * from './aggregator';
export { Semaphore } from './concurrency/semaphore';
