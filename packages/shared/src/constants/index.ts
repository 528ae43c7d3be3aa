export * from './limits';
export * from './capabilities';
export * from './vocabulary';
