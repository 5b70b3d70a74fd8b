import { Clause } from './ast';
import { ClauseSet, IndexedClause } from './clause-set';
import {
  clauseDepth,
  factor,
  isEmptyClause,
  isTautology,
  negateClause,
  normalizeVariables,
  resolve,
} from './resolution';
import { debugLogger, LogComponent } from './debug-logger';

export interface ProverConfig {
  /**
   * Stops the search after this many saturation rounds.
   */
  maxIterations?: number;

  /**
   * Stops the search if the working set would grow beyond this many clauses.
   */
  maxClauses?: number;

  /**
   * Wall-clock budget for the search in milliseconds.
   */
  timeoutMs?: number;

  /**
   * Resolvents with an atom deeper than this are discarded. Keeps inputs with
   * function symbols from generating ever deeper terms.
   */
  maxTermDepth?: number;

  /**
   * Adds the factors of every new clause to the search.
   */
  factoring?: boolean;

  /**
   * Drops resolvents containing both a literal and its complement.
   */
  discardTautologies?: boolean;
}

export const DEFAULT_PROVER_CONFIG: Readonly<Required<ProverConfig>> = {
  maxIterations: 64,
  maxClauses: 10_000,
  timeoutMs: Infinity,
  maxTermDepth: 8,
  factoring: true,
  discardTautologies: true,
};

export enum ProofStatus {
  Running = 'running',
  Proved = 'proved',
  NotEntailed = 'not-entailed',
  Inconclusive = 'inconclusive',
}

/**
 * Why a search stopped without proof or fixpoint. A depth limit means the
 * search reached a fixpoint only because some resolvents were discarded.
 */
export type InconclusiveReason =
  | 'iteration-limit'
  | 'clause-limit'
  | 'timeout'
  | 'depth-limit';

export interface ProofResult {
  status: Exclude<ProofStatus, ProofStatus.Running>;
  reason?: InconclusiveReason;
  /** Number of saturation rounds run. */
  iterations: number;
  /** Size of the working set when the search stopped. */
  clauses: number;
}

function checkCount(name: string, value: number, min: number): void {
  const whole = Number.isInteger(value) || value === Infinity;
  if (!whole || value < min) {
    throw new RangeError(`${name} must be a whole number >= ${min}, got ${value}`);
  }
}

/**
 * Merges a partial config over the defaults, throwing a RangeError on
 * nonsensical limits.
 */
export function resolveConfig(cfg?: ProverConfig): Required<ProverConfig> {
  const d = DEFAULT_PROVER_CONFIG;
  const config: Required<ProverConfig> = {
    maxIterations: cfg?.maxIterations ?? d.maxIterations,
    maxClauses: cfg?.maxClauses ?? d.maxClauses,
    timeoutMs: cfg?.timeoutMs ?? d.timeoutMs,
    maxTermDepth: cfg?.maxTermDepth ?? d.maxTermDepth,
    factoring: cfg?.factoring ?? d.factoring,
    discardTautologies: cfg?.discardTautologies ?? d.discardTautologies,
  };

  checkCount('maxIterations', config.maxIterations, 0);
  checkCount('maxClauses', config.maxClauses, 1);
  checkCount('maxTermDepth', config.maxTermDepth, 1);
  if (Number.isNaN(config.timeoutMs) || config.timeoutMs < 0) {
    throw new RangeError(`timeoutMs must be >= 0, got ${config.timeoutMs}`);
  }
  return config;
}

/**
 * Maps a result onto entailment: true if proved, false if saturation showed
 * the query does not follow, undefined if the search gave up.
 */
export function entailed(result: ProofResult): boolean | undefined {
  switch (result.status) {
    case ProofStatus.Proved:
      return true;
    case ProofStatus.NotEntailed:
      return false;
    case ProofStatus.Inconclusive:
      return undefined;
  }
}

/**
 * Decides whether the knowledge base entails the query clause by resolution
 * refutation: the query is negated (every literal flipped), added to the
 * knowledge base, and the set is saturated until the empty clause appears,
 * no new clause can be derived, or a limit is reached.
 *
 * Each round resolves every unordered pair of clauses in the working set.
 * Pairs of clauses that were both present in the previous round are skipped
 * since their resolvents are already in the set, and partners are taken from
 * the clause set's index, which only drops pairs that cannot resolve.
 *
 * @param kb - the knowledge base clauses
 * @param query - the clause to try and prove
 * @param cfg - optional limits and switches for the search
 */
export function infer(
  kb: readonly Clause[],
  query: Clause,
  cfg?: ProverConfig
): ProofResult {
  const config = resolveConfig(cfg);
  const deadline = Date.now() + config.timeoutMs;
  const working = new ClauseSet();

  // An empty query is falsum, whose negation adds nothing: the search then
  // succeeds iff the knowledge base itself is contradictory.
  const initial = isEmptyClause(query) ? [...kb] : [...kb, negateClause(query)];
  for (const clause of initial) {
    working.add(normalizeVariables(clause));
  }

  debugLogger.info(
    LogComponent.PROVER,
    `Starting proof of "${query.key}" from ${kb.length} clauses`
  );

  const outcome: { status: ProofStatus; reason?: InconclusiveReason } = {
    status: working.hasEmptyClause() ? ProofStatus.Proved : ProofStatus.Running,
  };
  let iterations = 0;
  let truncated = false;
  let fresh: IndexedClause[] = working.clauses();
  let freshFrom = 0;

  const stop = (
    status: Exclude<ProofStatus, ProofStatus.Running>,
    why?: InconclusiveReason
  ): void => {
    outcome.status = status;
    if (why) outcome.reason = why;
  };
  const running = (): boolean => outcome.status === ProofStatus.Running;

  // Files a resolvent or factor as a candidate for the next round unless it
  // is filtered out or already in the working set. Candidates are all new, so
  // the clause limit is checked as they arrive.
  const candidates = new Map<string, Clause>();
  const consider = (clause: Clause): void => {
    if (isEmptyClause(clause)) return stop(ProofStatus.Proved);
    if (config.discardTautologies && isTautology(clause)) return;
    if (clauseDepth(clause) > config.maxTermDepth) {
      truncated = true;
      return;
    }
    if (working.has(clause)) return;
    candidates.set(clause.key, clause);
    if (working.size() + candidates.size > config.maxClauses) {
      stop(ProofStatus.Inconclusive, 'clause-limit');
    }
  };

  while (running()) {
    if (iterations >= config.maxIterations) {
      stop(ProofStatus.Inconclusive, 'iteration-limit');
      break;
    }
    if (Date.now() >= deadline) {
      stop(ProofStatus.Inconclusive, 'timeout');
      break;
    }

    iterations++;
    candidates.clear();
    debugLogger.debug(
      LogComponent.PROVER,
      `Iteration ${iterations}: ${working.size()} clauses, ${fresh.length} new`
    );

    search: for (const given of fresh) {
      for (const partner of working.candidates(given)) {
        // both new: the pair is handled from the clause with the lower id
        if (partner.id >= freshFrom && partner.id < given.id) continue;
        if (Date.now() >= deadline) {
          stop(ProofStatus.Inconclusive, 'timeout');
          break search;
        }

        for (const resolvent of resolve(given, partner)) {
          if (isEmptyClause(resolvent)) {
            debugLogger.info(
              LogComponent.PROVER,
              `Empty clause derived from #${given.id} and #${partner.id} after ${iterations} iterations`
            );
          }
          consider(resolvent);
          if (!running()) break search;
        }
      }

      if (config.factoring) {
        for (const factored of factor(given)) {
          consider(factored);
          if (!running()) break search;
        }
      }
    }
    if (!running()) break;

    // Fixpoint: nothing new was derived.
    if (candidates.size === 0) {
      if (truncated) {
        stop(ProofStatus.Inconclusive, 'depth-limit');
      } else {
        stop(ProofStatus.NotEntailed);
      }
      break;
    }

    freshFrom = working.watermark();
    fresh = [];
    for (const clause of candidates.values()) {
      const indexed = working.add(clause);
      if (indexed) fresh.push(indexed);
    }
  }

  const { status, reason } = outcome;
  const result: ProofResult = {
    status: status === ProofStatus.Running ? ProofStatus.Inconclusive : status,
    iterations,
    clauses: working.size(),
  };
  if (reason) result.reason = reason;

  debugLogger.info(
    LogComponent.PROVER,
    `Finished "${query.key}": ${result.status}${reason ? ` (${reason})` : ''} after ${iterations} iterations with ${working.size()} clauses`
  );
  return result;
}
