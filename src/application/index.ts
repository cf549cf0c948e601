export * from './time-parser';
