export * from './cell-utils';
export * from './grid-utils';
export * from './outcome-utils';
