export * from './api-types';
export * from './grid-types';
export * from './structure-types';
export * from './rule-types';
