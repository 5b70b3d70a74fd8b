import { parseClause, parseLiteral } from './parse';
import { infer, ProofResult, ProverConfig } from './prover';
import { unifyLiterals, UnifyResult } from './unify';

export * from './ast';
export {
  Lexer,
  Parser,
  ParseError,
  TokenKind,
  parseClause,
  parseLiteral,
  parseTerm,
  looksLikeVariable,
} from './parse';
export type { Token } from './parse';
export * from './unify';
export * from './resolution';
export { ClauseSet } from './clause-set';
export type { IndexedClause } from './clause-set';
export * from './prover';
export {
  build,
  classify,
  entropy,
  informationGain,
  majorityLabel,
  splitBy,
  TreeKind,
} from './decision-tree';
export type { Branch, DecisionNode, Leaf, Row, Value } from './decision-tree';
export { debugLogger, DebugLogger, LogComponent, LogLevel } from './debug-logger';
export type { LoggerOptions } from './debug-logger';

/**
 * Unifies two literals given as text, e.g. `unifyText('Parent(x,y)',
 * 'Parent(John,Mary)')`. Literals of different polarity fail with a
 * `polarity` error. Throws a ParseError on malformed text.
 */
export function unifyText(left: string, right: string): UnifyResult {
  return unifyLiterals(parseLiteral(left), parseLiteral(right));
}

/**
 * Parses a knowledge base and query given as text and runs `infer` on them.
 * Each clause is either a string with literals separated by `|` or `∨`, or a
 * list of literal strings. Throws a ParseError before any search is done if
 * any clause is malformed.
 */
export function entails(
  kb: readonly (string | readonly string[])[],
  query: string | readonly string[],
  cfg?: ProverConfig
): ProofResult {
  return infer(kb.map(parseClause), parseClause(query), cfg);
}
