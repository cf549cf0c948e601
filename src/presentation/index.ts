export { DebugWriter } from './debug-writer';
export * from './result-printer';
export * from './result-serializer';
