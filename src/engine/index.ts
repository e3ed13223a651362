export * from './types';
export * from './overlap';
export * from './anonymizer';
export * from './deanonymizer';
export * from './strategies';
