export * from './debug-entries';
export * from './parsed-value';
export * from './zoned-time';
