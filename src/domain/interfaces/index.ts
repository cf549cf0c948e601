export * from './datelike.interface';
export * from './debug-writer.interface';
export * from './lookup.interface';
