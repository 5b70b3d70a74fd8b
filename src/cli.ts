#!/usr/bin/env node

import { parseClause, ParseError } from './parse';
import { resolve } from './resolution';
import { infer, ProofStatus, ProverConfig } from './prover';
import { renderSubstitution } from './unify';
import { unifyText } from './index';

function printUsage(out: (line: string) => void) {
  out(`Usage: clausal [COMMAND] [OPTIONS] <arguments>

COMMANDS:
  parse <clause>               Parse and print a clause in canonical form
  unify <literal> <literal>    Print the most general unifier of two literals
  resolve <clause> <clause>    Print every resolvent of two clauses
  prove [OPTIONS] <query>      Decide whether the --kb clauses entail the query
  help                         Show this help message

OPTIONS (prove):
  --kb <clause>                Add a knowledge base clause (repeatable)
  --max-iterations <n>         Give up after n saturation rounds
  --max-depth <n>              Discard resolvents with atoms deeper than n
  --timeout <ms>               Give up after this many milliseconds
  --no-factoring               Do not add factors of new clauses
  -h, --help                   Show help message

EXAMPLES:
  clausal parse "¬King(x) | ¬Greedy(x) | Evil(x)"
  clausal unify "Parent(x, y)" "Parent(John, Mary)"
  clausal resolve "A" "¬A | C"
  clausal prove --kb "¬King(x) | ¬Greedy(x) | Evil(x)" --kb "King(John)" \\
    --kb "Greedy(x)" "Evil(John)"

CLAUSE SYNTAX:
  Variables:          lowercase letters in arguments, x, y, x', ...
  Propositions:       bare names, e.g. p, Rain
  Constants:          any other name, e.g. John, A, 0
  Compound terms:     f(x), Parent(x, y), ...
  Negation:           ¬P(x), !P(x) or ~P(x)
  Disjunction:        P(x) | Q(x) or P(x) ∨ Q(x)
  Empty clause:       ⊥
`);
}

class UsageError extends Error {}

function parseCount(flag: string, value: string | undefined): number {
  const n = Number(value);
  if (value === undefined || !Number.isInteger(n) || n < 0) {
    throw new UsageError(`${flag} expects a whole number`);
  }
  return n;
}

function parseProveArgs(args: string[]): {
  kb: string[];
  query: string;
  cfg: ProverConfig;
} {
  const kb: string[] = [];
  const cfg: ProverConfig = {};
  const positional: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '--kb': {
        const clause = args[++i];
        if (clause === undefined) throw new UsageError('--kb expects a clause');
        kb.push(clause);
        break;
      }
      case '--max-iterations':
        cfg.maxIterations = parseCount(arg, args[++i]);
        break;
      case '--max-depth':
        cfg.maxTermDepth = parseCount(arg, args[++i]);
        break;
      case '--timeout':
        cfg.timeoutMs = parseCount(arg, args[++i]);
        break;
      case '--no-factoring':
        cfg.factoring = false;
        break;
      default:
        if (arg.startsWith('--')) throw new UsageError(`Unknown option '${arg}'`);
        positional.push(arg);
    }
  }

  if (positional.length !== 1) {
    throw new UsageError('prove expects exactly one query clause');
  }
  return { kb, query: positional[0], cfg };
}

function prove(args: string[], out: (line: string) => void): number {
  const { kb, query, cfg } = parseProveArgs(args);
  const result = infer(kb.map((c) => parseClause(c)), parseClause(query), cfg);
  switch (result.status) {
    case ProofStatus.Proved:
      out('proved');
      return 0;
    case ProofStatus.NotEntailed:
      out('not-entailed');
      return 1;
    case ProofStatus.Inconclusive:
      out(`inconclusive (${result.reason ?? 'unknown'})`);
      return 2;
  }
}

function expectArgs(command: string, args: string[], count: number): void {
  if (args.length !== count) {
    throw new UsageError(`${command} expects ${count} argument${count === 1 ? '' : 's'}`);
  }
}

/**
 * Runs the CLI and returns the exit code. For `prove` the code is 0 when the
 * query was proved, 1 when it is not entailed and 2 when the search was
 * inconclusive; other commands use 0 for success and 1 for failure.
 */
export function run(
  args: string[],
  out: (line: string) => void = (line) => console.log(line),
  err: (line: string) => void = (line) => console.error(line)
): number {
  if (args.length === 0 || args.includes('-h') || args.includes('--help')) {
    printUsage(out);
    return 0;
  }

  const [command, ...rest] = args;

  try {
    switch (command) {
      case 'help':
        printUsage(out);
        return 0;
      case 'parse':
        expectArgs(command, rest, 1);
        out(parseClause(rest[0]).key);
        return 0;
      case 'unify': {
        expectArgs(command, rest, 2);
        const res = unifyText(rest[0], rest[1]);
        if (res.ok) {
          out(renderSubstitution(res.sub));
          return 0;
        }
        out(`fail: ${res.error.message}`);
        return 1;
      }
      case 'resolve': {
        expectArgs(command, rest, 2);
        for (const resolvent of resolve(parseClause(rest[0]), parseClause(rest[1]))) {
          out(resolvent.key);
        }
        return 0;
      }
      case 'prove':
        return prove(rest, out);
      default:
        err(`Error: Unrecognised command '${command}'`);
        err('Use "clausal help" for usage information');
        return 1;
    }
  } catch (error) {
    if (error instanceof UsageError || error instanceof ParseError || error instanceof RangeError) {
      err(`Error: ${error.message}`);
      return 1;
    }
    throw error;
  }
}

if (require.main === module) {
  process.exit(run(process.argv.slice(2)));
}
