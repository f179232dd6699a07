/**
 * QuarryDB - Parser Module
 *
 * Exports the SQL tokenizer and parser.
 */

export { Tokenizer, tokenize } from './Tokenizer';
export type { Token, TokenType } from './Tokenizer';
export { Parser, parseSql } from './Parser';
