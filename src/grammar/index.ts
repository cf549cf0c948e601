export * from './grammar';
export * from './lexicon';
export * from './parse-tree';
export { tokenize } from './tokenizer';
