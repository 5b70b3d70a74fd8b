import {
  equal,
  Literal,
  NodeKind,
  renderTerm,
  Term,
  transform,
  Var,
} from './ast';
import { debugLogger, LogComponent } from './debug-logger';

/**
 * Represents a mapping from variable names to terms. Bindings may chain
 * through other variables (x -> y, y -> John), and must never be cyclic.
 */
export type Substitution = ReadonlyMap<string, Term>;

export const EMPTY_SUBSTITUTION: Substitution = new Map();

/**
 * Reasons two terms fail to unify:
 * - clash: different names, or a constant against a compound
 * - arity: same function name applied to different argument counts
 * - occurs: binding a variable to a term containing it
 * - polarity: literals of different polarity
 */
export type UnifyErrorKind = 'clash' | 'arity' | 'occurs' | 'polarity';

export type UnifyError = {
  kind: UnifyErrorKind;
  message: string;
  left: Term;
  right: Term;
};

/**
 * Result of a unification. An empty substitution is a success.
 */
export type UnifyResult =
  | { ok: true; sub: Substitution }
  | { ok: false; error: UnifyError };

const MESSAGES: Record<UnifyErrorKind, (l: string, r: string) => string> = {
  clash: (l, r) => `cannot unify ${l} with ${r}`,
  arity: (l, r) => `arity mismatch between ${l} and ${r}`,
  occurs: (l, r) => `${l} occurs in ${r}`,
  polarity: (l, r) => `literals ${l} and ${r} differ in polarity`,
};

function failure(kind: UnifyErrorKind, left: Term, right: Term): UnifyResult {
  const message = MESSAGES[kind](renderTerm(left), renderTerm(right));
  debugLogger.trace(LogComponent.UNIFY, `Failed: ${message}`);
  return { ok: false, error: { kind, message, left, right } };
}

/**
 * Follows variable bindings until reaching an unbound variable or a
 * non-variable term.
 */
export function walk(t: Term, sub: Substitution): Term {
  let cur = t;
  for (;;) {
    if (cur.kind !== NodeKind.Var) return cur;
    const next = sub.get(cur.name);
    if (next === undefined) return cur;
    cur = next;
  }
}

/**
 * Returns true if the variable occurs in the term under the substitution.
 */
export function occurs(name: string, t: Term, sub: Substitution): boolean {
  const walked = walk(t, sub);
  switch (walked.kind) {
    case NodeKind.Var:
      return walked.name === name;
    case NodeKind.Const:
      return false;
    case NodeKind.FunApp:
      return walked.args.some((arg) => occurs(name, arg, sub));
  }
}

function bind(v: Var, t: Term, sub: Substitution): UnifyResult {
  if (occurs(v.name, t, sub)) {
    return failure('occurs', v, t);
  }
  const extended = new Map(sub);
  extended.set(v.name, t);
  return { ok: true, sub: extended };
}

/**
 * Returns the most general substitution extending `sub` that makes the two
 * terms syntactically equal (Robinson unification with occurs check). The
 * input substitution is never modified.
 */
export function unify(
  left: Term,
  right: Term,
  sub: Substitution = EMPTY_SUBSTITUTION
): UnifyResult {
  const l = walk(left, sub);
  const r = walk(right, sub);

  if (equal(l, r)) return { ok: true, sub };
  if (l.kind === NodeKind.Var) return bind(l, r, sub);
  if (r.kind === NodeKind.Var) return bind(r, l, sub);

  if (l.kind === NodeKind.FunApp && r.kind === NodeKind.FunApp) {
    if (l.name !== r.name) return failure('clash', l, r);
    if (l.args.length !== r.args.length) return failure('arity', l, r);

    let acc: Substitution = sub;
    for (let i = 0; i < l.args.length; i++) {
      const res = unify(l.args[i], r.args[i], acc);
      if (!res.ok) return res;
      acc = res.sub;
    }
    return { ok: true, sub: acc };
  }

  return failure('clash', l, r);
}

/**
 * Friendly wrapper around `unify` for literals, which must agree in polarity.
 */
export function unifyLiterals(
  a: Literal,
  b: Literal,
  sub: Substitution = EMPTY_SUBSTITUTION
): UnifyResult {
  if (a.negated !== b.negated) return failure('polarity', a.atom, b.atom);
  return unify(a.atom, b.atom, sub);
}

/**
 * Applies a substitution to a term, following chains of bindings so the
 * result contains no bound variables.
 */
export function applyTerm(t: Term, sub: Substitution): Term {
  if (sub.size === 0) return t;
  return transform(t, {
    Var: (v) => {
      const bound = sub.get(v.name);
      return bound === undefined ? v : applyTerm(bound, sub);
    },
  });
}

export function applyLiteral(l: Literal, sub: Substitution): Literal {
  return { atom: applyTerm(l.atom, sub), negated: l.negated };
}

/**
 * Returns the literals with the substitution applied. `applyClause` in
 * resolution.ts rebuilds a clause from these, since applying may merge
 * literals.
 */
export function applyLiterals(
  literals: readonly Literal[],
  sub: Substitution
): Literal[] {
  return literals.map((l) => applyLiteral(l, sub));
}

/**
 * Returns a substitution equivalent to applying `first` and then `second`.
 */
export function compose(first: Substitution, second: Substitution): Substitution {
  const res = new Map<string, Term>();
  for (const [name, t] of first) {
    const applied = applyTerm(t, second);
    if (applied.kind === NodeKind.Var && applied.name === name) continue;
    res.set(name, applied);
  }
  for (const [name, t] of second) {
    if (!res.has(name) && !first.has(name)) res.set(name, t);
  }
  return res;
}

/**
 * Renders a substitution with every binding fully applied, e.g.
 * `{x → John, y → Mary}`.
 */
export function renderSubstitution(sub: Substitution): string {
  const parts: string[] = [];
  for (const [name, t] of sub) {
    parts.push(`${name} → ${renderTerm(applyTerm(t, sub))}`);
  }
  return `{${parts.join(', ')}}`;
}
