export * from './builder';
export * from './built-transaction';
export * from './constants';
export * from './signing';
export * from './submit';
