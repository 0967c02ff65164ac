export * from './users';
export * from './challenges';
export * from './attempts';
export * from './scores';
export * from './badges';
