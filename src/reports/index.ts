export * from './detection';
export * from './text';
