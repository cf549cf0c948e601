export * from './field-set';
export * from './inference-engine';
export * from './render-context';
export * from './renderer';
export * from './semantic-builder';
