export * from './types';
export * from './patternMatcher';
export * from './patternDetector';
export * from './personName';
export * from './regex';
export * from './enhanced';
export * from './validators';
export * from './registry';
