export * from './guard';
export * from './session';
export * from './hooks';
