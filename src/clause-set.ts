import { Clause, Literal, NodeKind, Term } from './ast';
import { EMPTY_CLAUSE_KEY } from './resolution';
import { debugLogger, LogComponent, LogLevel } from './debug-logger';

/**
 * A clause as stored in a clause set, numbered in insertion order.
 */
export interface IndexedClause extends Clause {
  readonly id: number;
}

/** Index bucket for variable atoms, which may unify with any atom. */
const WILDCARD = '*';

/**
 * Index key of an atom: name and arity, so that atoms which could unify share
 * a bucket.
 */
function indexKey(atom: Term): string {
  switch (atom.kind) {
    case NodeKind.Var:
      return WILDCARD;
    case NodeKind.Const:
      return `${atom.name}/0`;
    case NodeKind.FunApp:
      return `${atom.name}/${atom.args.length}`;
  }
}

type PolarityIndex = {
  buckets: Map<string, Set<IndexedClause>>;
  all: Set<IndexedClause>;
};

function createPolarityIndex(): PolarityIndex {
  return { buckets: new Map(), all: new Set() };
}

/**
 * The working set of the prover. Clauses are unique by key, and indexed by
 * the name, arity and polarity of their literals so that resolution partners
 * can be looked up without scanning the whole set.
 */
export class ClauseSet {
  private readonly byKey: Map<string, IndexedClause> = new Map();
  private readonly positive: PolarityIndex = createPolarityIndex();
  private readonly negative: PolarityIndex = createPolarityIndex();
  private nextId = 0;

  /**
   * Inserts a clause, returning its indexed form, or undefined if a clause
   * with the same key is already present.
   */
  add(clause: Clause): IndexedClause | undefined {
    if (this.byKey.has(clause.key)) return undefined;

    const indexed: IndexedClause = {
      literals: clause.literals,
      key: clause.key,
      id: this.nextId++,
    };
    this.byKey.set(indexed.key, indexed);

    for (const literal of indexed.literals) {
      const index = literal.negated ? this.negative : this.positive;
      const key = indexKey(literal.atom);
      let bucket = index.buckets.get(key);
      if (!bucket) {
        bucket = new Set();
        index.buckets.set(key, bucket);
      }
      bucket.add(indexed);
      index.all.add(indexed);
    }

    debugLogger.logClause(
      LogComponent.CLAUSE_MGMT,
      LogLevel.DEBUG,
      `Added clause (now ${this.byKey.size} clauses)`,
      indexed
    );
    return indexed;
  }

  has(clause: Clause): boolean {
    return this.byKey.has(clause.key);
  }

  get(key: string): IndexedClause | undefined {
    return this.byKey.get(key);
  }

  /**
   * True if every given clause is already in the set.
   */
  containsAll(clauses: Iterable<Clause>): boolean {
    for (const clause of clauses) {
      if (!this.has(clause)) return false;
    }
    return true;
  }

  hasEmptyClause(): boolean {
    return this.byKey.has(EMPTY_CLAUSE_KEY);
  }

  size(): number {
    return this.byKey.size;
  }

  /**
   * The id the next inserted clause will receive. Clauses with an id at or
   * above a previously read value were added after that read.
   */
  watermark(): number {
    return this.nextId;
  }

  /**
   * Clauses in insertion order.
   */
  clauses(): IndexedClause[] {
    return [...this.byKey.values()];
  }

  [Symbol.iterator](): Iterator<IndexedClause> {
    return this.byKey.values();
  }

  /**
   * Clauses holding a literal that might resolve against one of the literals
   * of `clause` (opposite polarity, same name and arity, or a variable atom on
   * either side), ordered by id. The clause itself is excluded.
   */
  candidates(clause: Clause): IndexedClause[] {
    const found: Set<IndexedClause> = new Set();
    for (const literal of clause.literals) {
      for (const c of this.partnersOf(literal)) {
        if (c.key !== clause.key) found.add(c);
      }
    }

    return [...found].sort((a, b) => a.id - b.id);
  }

  private partnersOf(literal: Literal): Iterable<IndexedClause> {
    const index = literal.negated ? this.positive : this.negative;
    const key = indexKey(literal.atom);
    if (key === WILDCARD) return index.all;
    return [
      ...(index.buckets.get(key) ?? []),
      ...(index.buckets.get(WILDCARD) ?? []),
    ];
  }
}
