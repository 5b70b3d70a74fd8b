/**
 * Types of nodes in a first-order term:
 */
export const enum NodeKind {
  Var, // variable term x
  Const, // constant term c
  FunApp, // compound term f(t_1, ..., t_n), also used for predicate atoms
}

/** Variable term. */
export type Var = { readonly kind: NodeKind.Var; readonly name: string };

/** Constant term. */
export type Const = { readonly kind: NodeKind.Const; readonly name: string };

/** Application of a function or predicate name to argument terms. */
export type FunApp = {
  readonly kind: NodeKind.FunApp;
  readonly name: string;
  readonly args: readonly Term[];
};

/**
 * Represents a first-order term, which is either a variable, constant or an
 * application of an n-ary function to n subterms. The atom of a literal is a
 * term too, so `Parent(x,John)` is a FunApp named `Parent`.
 */
export type Term = Var | Const | FunApp;

/**
 * A term together with a polarity.
 */
export type Literal = { readonly atom: Term; readonly negated: boolean };

/**
 * A clause represents a disjunction of literals. Literals are kept unique by
 * canonical text and sorted by it, and `key` is the canonical text of the
 * whole clause, so two clauses are the same set iff their keys are equal.
 */
export type Clause = {
  readonly literals: readonly Literal[];
  readonly key: string;
};

export function mkVar(name: string): Var {
  return { kind: NodeKind.Var, name };
}

export function mkConst(name: string): Const {
  return { kind: NodeKind.Const, name };
}

export function mkFunApp(name: string, args: readonly Term[]): FunApp {
  return { kind: NodeKind.FunApp, name, args };
}

export function mkLiteral(atom: Term, negated = false): Literal {
  return { atom, negated };
}

/**
 * Callbacks for `transform`.
 */
export type TransformFns = {
  Var?: (t: Var) => Term;
  Const?: (t: Const) => Term;
  FunApp?: (t: FunApp) => Term;
};

/**
 * Helper for transforming terms bottom-up. A FunApp without a callback is
 * rebuilt from its transformed arguments.
 */
export function transform(t: Term, cbs: TransformFns): Term {
  switch (t.kind) {
    case NodeKind.Var:
      return cbs.Var ? cbs.Var(t) : t;
    case NodeKind.Const:
      return cbs.Const ? cbs.Const(t) : t;
    case NodeKind.FunApp: {
      if (cbs.FunApp) return cbs.FunApp(t);
      return {
        ...t,
        args: t.args.map((arg) => transform(arg, cbs)),
      };
    }
    default: {
      const _exhaustive: never = t;
      throw new Error(_exhaustive);
    }
  }
}

/**
 * Returns the variable names of a term in order of first appearance.
 */
export function getVars(t: Term): string[] {
  const vars: string[] = [];
  const seen: Set<string> = new Set();

  const visit = (t: Term): void => {
    switch (t.kind) {
      case NodeKind.Var:
        if (!seen.has(t.name)) {
          seen.add(t.name);
          vars.push(t.name);
        }
        break;
      case NodeKind.Const:
        break;
      case NodeKind.FunApp:
        t.args.forEach(visit);
        break;
      default: {
        const _exhaustive: never = t;
        throw new Error(_exhaustive);
      }
    }
  };

  visit(t);
  return vars;
}

/**
 * Returns true if the term contains no variables.
 */
export function isGround(t: Term): boolean {
  return getVars(t).length === 0;
}

/**
 * Depth of a term. Variables and constants have depth 1, applications have
 * depth 1 + max depth of their arguments.
 */
export function termDepth(t: Term): number {
  switch (t.kind) {
    case NodeKind.Var:
    case NodeKind.Const:
      return 1;
    case NodeKind.FunApp:
      return 1 + Math.max(...t.args.map(termDepth), 0);
  }
}

/**
 * Returns true if the given terms are equal syntactically.
 */
export function equal(t: Term, u: Term): boolean {
  switch (t.kind) {
    case NodeKind.Var:
      if (u.kind != NodeKind.Var) return false;
      return t.name == u.name;
    case NodeKind.Const:
      if (u.kind != NodeKind.Const) return false;
      return t.name == u.name;
    case NodeKind.FunApp:
      if (u.kind != NodeKind.FunApp) return false;
      return (
        t.name == u.name &&
        t.args.length == u.args.length &&
        t.args.every((sub, i) => equal(sub, u.args[i]))
      );
    default: {
      const _exhaustive: never = t;
      throw new Error(_exhaustive);
    }
  }
}

/**
 * Renders a term in canonical form: no whitespace, arguments separated by
 * bare commas, e.g. `Loves(father(x),x)`.
 */
export function renderTerm(t: Term): string {
  switch (t.kind) {
    case NodeKind.Var:
    case NodeKind.Const:
      return t.name;
    case NodeKind.FunApp:
      return `${t.name}(${t.args.map(renderTerm).join(',')})`;
  }
}

/**
 * Renders a literal in canonical form. Two literals are equal iff their
 * rendered forms are equal.
 */
export function renderLiteral(l: Literal): string {
  return l.negated ? `¬${renderTerm(l.atom)}` : renderTerm(l.atom);
}

