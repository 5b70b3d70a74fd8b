import {
  Clause,
  getVars,
  Literal,
  mkVar,
  renderLiteral,
  Term,
  termDepth,
  transform,
} from './ast';
import { applyLiterals, Substitution, unify } from './unify';
import { debugLogger, LogComponent } from './debug-logger';

/** Canonical text of the clause with no literals. */
export const EMPTY_CLAUSE_KEY = '⊥';

// Canonical variable names, in order of first appearance within a clause.
const VAR_NAMES = 'xyzwvutsrqponmlkjihgfedcba';

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Builds a clause with set semantics: literals are deduplicated by canonical
 * text and sorted by it.
 */
export function createClause(literals: readonly Literal[]): Clause {
  const byText = new Map<string, Literal>();
  for (const literal of literals) {
    const text = renderLiteral(literal);
    if (!byText.has(text)) byText.set(text, literal);
  }

  const entries = [...byText.entries()].sort(([a], [b]) => compareText(a, b));
  return {
    literals: entries.map(([, literal]) => literal),
    key:
      entries.length === 0
        ? EMPTY_CLAUSE_KEY
        : entries.map(([text]) => text).join(' ∨ '),
  };
}

export function isEmptyClause(clause: Clause): boolean {
  return clause.literals.length === 0;
}

/**
 * Renders a clause as a human-readable string.
 */
export function renderClause(clause: Clause): string {
  return clause.key;
}

/**
 * Returns the literal with its polarity toggled.
 */
export function complement(literal: Literal): Literal {
  return { atom: literal.atom, negated: !literal.negated };
}

/**
 * Flips the polarity of every literal of a clause.
 */
export function negateClause(clause: Clause): Clause {
  return createClause(clause.literals.map(complement));
}

/**
 * Applies a substitution to every literal of a clause, merging literals that
 * become identical.
 */
export function applyClause(clause: Clause, sub: Substitution): Clause {
  return createClause(applyLiterals(clause.literals, sub));
}

/**
 * Returns the variable names of a clause in order of first appearance.
 */
export function clauseVars(clause: Clause): string[] {
  const seen: Set<string> = new Set();
  for (const literal of clause.literals) {
    for (const name of getVars(literal.atom)) seen.add(name);
  }
  return [...seen];
}

/**
 * Maximum depth of the atoms of a clause, 0 for the empty clause.
 */
export function clauseDepth(clause: Clause): number {
  return Math.max(0, ...clause.literals.map((l) => termDepth(l.atom)));
}

/**
 * Checks if a clause is a tautology (contains P and ¬P for some atom P).
 */
export function isTautology(clause: Clause): boolean {
  const texts = new Set(clause.literals.map(renderLiteral));
  return clause.literals.some((l) => texts.has(renderLiteral(complement(l))));
}

function renameLiteral(
  literal: Literal,
  names: ReadonlyMap<string, string>
): Literal {
  const rename = (t: Term): Term =>
    transform(t, {
      Var: (v) => {
        const renamed = names.get(v.name);
        return renamed === undefined ? v : mkVar(renamed);
      },
    });
  return { atom: rename(literal.atom), negated: literal.negated };
}

/**
 * Renames the variables of a clause that appear in `taken`, so that the clause
 * shares no variable with another clause before the two are resolved. Fresh
 * names are built by appending primes.
 */
export function renameApart(clause: Clause, taken: ReadonlySet<string>): Clause {
  const vars = clauseVars(clause);
  const used = new Set([...taken, ...vars]);
  const names = new Map<string, string>();

  for (const name of vars) {
    if (!taken.has(name)) continue;
    let fresh = `${name}'`;
    while (used.has(fresh)) fresh += "'";
    used.add(fresh);
    names.set(name, fresh);
  }

  if (names.size === 0) return clause;
  return createClause(clause.literals.map((l) => renameLiteral(l, names)));
}

// Canonical text of a literal with every variable blanked out.
function shapeOf(literal: Literal): string {
  const blanks = new Map(
    getVars(literal.atom).map((name): [string, string] => [name, '?'])
  );
  return renderLiteral(renameLiteral(literal, blanks));
}

/**
 * Renames the variables of a clause to x, y, z, w, ... in order of first
 * appearance, with literals visited by their variable-blind shape. Variants
 * of a clause therefore share a key, except for rare orderings where two
 * literals have the same shape.
 */
export function normalizeVariables(clause: Clause): Clause {
  const vars = clauseVars(clause);
  if (vars.length === 0) return clause;

  const ordered = clause.literals
    .map((literal) => ({
      literal,
      shape: shapeOf(literal),
      text: renderLiteral(literal),
    }))
    .sort(
      (a, b) => compareText(a.shape, b.shape) || compareText(a.text, b.text)
    );

  const names = new Map<string, string>();
  for (const { literal } of ordered) {
    for (const name of getVars(literal.atom)) {
      if (names.has(name)) continue;
      const idx = names.size;
      names.set(name, idx < VAR_NAMES.length ? VAR_NAMES.charAt(idx) : `v${idx}`);
    }
  }

  return createClause(ordered.map(({ literal }) => renameLiteral(literal, names)));
}

/**
 * A possible resolution between a literal in one clause and a literal of
 * opposite polarity in another clause whose atoms unify. The two clauses are
 * assumed to share no variables.
 */
export type Resolution = {
  left: Clause;
  leftIdx: number;
  right: Clause;
  rightIdx: number;
  sub: Substitution;
};

/**
 * Returns a list of valid resolutions between the two clauses.
 */
export function getResolutions(a: Clause, b: Clause): Resolution[] {
  const res: Resolution[] = [];
  for (const [i, litA] of a.literals.entries()) {
    for (const [j, litB] of b.literals.entries()) {
      if (litA.negated === litB.negated) continue;
      const unified = unify(litA.atom, litB.atom);
      if (unified.ok) {
        res.push({ left: a, leftIdx: i, right: b, rightIdx: j, sub: unified.sub });
      }
    }
  }
  return res;
}

/**
 * Applies a resolution to create a new clause. The new clause contains the
 * literals of both clauses (except the resolved pair) with the substitution
 * applied, and its variables normalised.
 */
export function applyResolution(resolution: Resolution): Clause {
  const { left, leftIdx, right, rightIdx, sub } = resolution;
  const literals = [
    ...left.literals.filter((_, i) => i !== leftIdx),
    ...right.literals.filter((_, j) => j !== rightIdx),
  ];
  return normalizeVariables(createClause(applyLiterals(literals, sub)));
}

/**
 * Returns every resolvent of the two clauses, without duplicates. The second
 * clause is renamed apart from the first before matching, so variables
 * shared by name are not accidentally bound together.
 */
export function resolve(a: Clause, b: Clause): Clause[] {
  const right = renameApart(b, new Set(clauseVars(a)));
  const resolvents = new Map<string, Clause>();

  for (const resolution of getResolutions(a, right)) {
    const resolvent = applyResolution(resolution);
    if (resolvents.has(resolvent.key)) continue;
    resolvents.set(resolvent.key, resolvent);

    debugLogger.trace(
      LogComponent.RESOLUTION,
      `Resolved "${a.key}"[${resolution.leftIdx}] with "${b.key}"[${resolution.rightIdx}]: ${resolvent.key}`
    );
  }

  return [...resolvents.values()];
}

/**
 * Represents a factoring opportunity where two literals in a clause can be
 * unified.
 */
export type Factor = {
  clause: Clause;
  idx1: number;
  idx2: number;
  sub: Substitution;
};

/**
 * Finds all possible factors in a clause by attempting to unify pairs of
 * literals with the same polarity.
 */
export function getFactors(clause: Clause): Factor[] {
  const factors: Factor[] = [];
  const { literals } = clause;

  for (let i = 0; i < literals.length; i++) {
    for (let j = i + 1; j < literals.length; j++) {
      if (literals[i].negated !== literals[j].negated) continue;
      const unified = unify(literals[i].atom, literals[j].atom);
      if (unified.ok) {
        factors.push({ clause, idx1: i, idx2: j, sub: unified.sub });
      }
    }
  }

  return factors;
}

/**
 * Applies a factor: the unifier merges the two literals into one.
 */
export function applyFactor(factor: Factor): Clause {
  return normalizeVariables(applyClause(factor.clause, factor.sub));
}

/**
 * Returns the distinct factors of a clause, excluding the clause itself.
 */
export function factor(clause: Clause): Clause[] {
  const factors = new Map<string, Clause>();
  for (const f of getFactors(clause)) {
    const factored = applyFactor(f);
    if (factored.key === clause.key || factors.has(factored.key)) continue;
    factors.set(factored.key, factored);

    debugLogger.trace(
      LogComponent.FACTORING,
      `Factored "${clause.key}"[${f.idx1},${f.idx2}]: ${factored.key}`
    );
  }
  return [...factors.values()];
}
