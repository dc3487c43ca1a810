// engine/scanner/tree-sitter.ts — Tree-sitter parser factory
import { createRequire } from 'node:module';
import type Parser from 'tree-sitter';

const require = createRequire(import.meta.url);
const TreeSitter: typeof Parser = require('tree-sitter');

// Grammar objects are opaque to us; tree-sitter's own typings take them untyped.
const LANGUAGE_MAP: Record<string, () => unknown> = {
  python: () => require('tree-sitter-python'),
};

/**
 * The native binding allocates a 32 KiB input buffer by default and rejects
 * longer strings, so size it from the source.
 */
const MIN_BUFFER_SIZE = 32 * 1024;

/**
 * Creates a tree-sitter parser configured for the given language.
 * Throws if the language is not supported.
 */
export function createParser(language: string): Parser {
  const loader = LANGUAGE_MAP[language];
  if (!loader) throw new Error(`Unsupported language: ${language}`);
  const parser = new TreeSitter();
  parser.setLanguage(loader());
  return parser;
}

/**
 * Parses source text with a fresh parser for the given language.
 */
export function parseSource(source: string, language: string): Parser.Tree {
  const parser = createParser(language);
  const bufferSize = Math.max(MIN_BUFFER_SIZE, source.length * 2);
  return parser.parse(source, undefined, { bufferSize });
}

/**
 * Returns all supported language identifiers.
 */
export function getSupportedLanguages(): string[] {
  return Object.keys(LANGUAGE_MAP);
}
