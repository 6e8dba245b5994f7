export { tokenize, type TokenizeOptions } from './tokenizer.js';
export { TokenStream } from './stream.js';
export { BufferPool, withBuffer } from './pool.js';
export { classifyPlain } from './helpers.js';
export { foldBlockLines, type Chomping } from './readers.js';
