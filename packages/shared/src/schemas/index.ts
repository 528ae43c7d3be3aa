export * from './rule-schema';
export * from './structure-schema';
export * from './audit-schema';
