import { describe, it } from 'mocha';
import { expect } from 'chai';
import { mkConst, mkLiteral } from './ast';
import { parseClause, parseLiteral } from './parse';
import {
  clauseDepth,
  clauseVars,
  complement,
  createClause,
  EMPTY_CLAUSE_KEY,
  factor,
  getFactors,
  getResolutions,
  isEmptyClause,
  isTautology,
  negateClause,
  normalizeVariables,
  renameApart,
  renderClause,
  resolve,
} from './resolution';

const keys = (clauses: { key: string }[]) => clauses.map((c) => c.key);

describe('resolution.ts', () => {
  describe('createClause', () => {
    it('should sort literals by canonical text', () => {
      const c = parseClause('¬King(x) | ¬Greedy(x) | Evil(x)');
      expect(c.key).to.equal('Evil(x) ∨ ¬Greedy(x) ∨ ¬King(x)');
      expect(c.literals.length).to.equal(3);
    });

    it('should merge duplicate literals', () => {
      expect(parseClause('A | A').key).to.equal('A');
      expect(parseClause('P(x, y) | P(x,y)').literals.length).to.equal(1);
    });

    it('should keep complementary literals apart', () => {
      expect(parseClause('A | ¬A').key).to.equal('A ∨ ¬A');
    });

    it('should build literals from terms directly', () => {
      const c = createClause([mkLiteral(mkConst('A'), true), mkLiteral(mkConst('A'))]);
      expect(c.key).to.equal('A ∨ ¬A');
    });

    it('should treat the empty literal list as the empty clause', () => {
      const empty = createClause([]);
      expect(empty.key).to.equal(EMPTY_CLAUSE_KEY);
      expect(isEmptyClause(empty)).to.be.true;
      expect(renderClause(empty)).to.equal('⊥');
    });

    it('should give equal sets the same key regardless of order', () => {
      expect(parseClause('B | ¬A | C').key).to.equal(parseClause('C | B | ¬A').key);
    });
  });

  describe('complement and negateClause', () => {
    it('should toggle the polarity of a literal', () => {
      const lit = parseLiteral('Parent(x,John)');
      expect(complement(lit)).to.deep.equal({ atom: lit.atom, negated: true });
      expect(complement(complement(lit))).to.deep.equal(lit);
    });

    it('should flip every literal of a clause', () => {
      expect(negateClause(parseClause('A | ¬B')).key).to.equal('B ∨ ¬A');
      expect(negateClause(createClause([])).key).to.equal('⊥');
    });
  });

  describe('clause helpers', () => {
    it('should list variables in order of first appearance', () => {
      expect(clauseVars(parseClause('P(x,y) | Q(y,z)'))).to.deep.equal(['x', 'y', 'z']);
      expect(clauseVars(parseClause('P(A)'))).to.deep.equal([]);
    });

    it('should compute the depth of the deepest atom', () => {
      expect(clauseDepth(parseClause('P(f(g(x))) | Q'))).to.equal(4);
      expect(clauseDepth(parseClause('Q'))).to.equal(1);
      expect(clauseDepth(createClause([]))).to.equal(0);
    });

    it('should detect tautologies textually', () => {
      expect(isTautology(parseClause('A | ¬A'))).to.be.true;
      expect(isTautology(parseClause('P(x) | B | ¬P(x)'))).to.be.true;
      expect(isTautology(parseClause('A | ¬B'))).to.be.false;
      expect(isTautology(parseClause('P(x) | ¬P(y)'))).to.be.false;
    });
  });

  describe('renameApart', () => {
    it('should prime variables that are taken', () => {
      const c = renameApart(parseClause('P(x,y)'), new Set(['x']));
      expect(c.key).to.equal("P(x',y)");
    });

    it('should skip names that are already in use', () => {
      const c = renameApart(parseClause('P(x,y)'), new Set(['x', "x'"]));
      expect(c.key).to.equal("P(x'',y)");
    });

    it('should swap names without looping', () => {
      const c = renameApart(parseClause('P(x,y)'), new Set(['x', 'y']));
      expect(c.key).to.equal("P(x',y')");
    });

    it('should return the clause unchanged when nothing clashes', () => {
      const c = parseClause('P(x)');
      expect(renameApart(c, new Set(['y']))).to.equal(c);
    });
  });

  describe('normalizeVariables', () => {
    it('should rename variables to canonical letters', () => {
      const c = normalizeVariables(parseClause('Q(u) | P(w,u)'));
      expect(c.key).to.equal('P(x,y) ∨ Q(y)');
    });

    it('should give variants the same key', () => {
      const a = normalizeVariables(parseClause('¬King(z) | Evil(z)'));
      const b = normalizeVariables(parseClause('Evil(x) | ¬King(x)'));
      expect(a.key).to.equal('Evil(x) ∨ ¬King(x)');
      expect(b.key).to.equal(a.key);
    });

    it('should leave ground clauses alone', () => {
      const c = parseClause('P(A) | ¬Q(B)');
      expect(normalizeVariables(c)).to.equal(c);
    });
  });

  describe('getResolutions', () => {
    it('should find a resolution when one exists', () => {
      const rs = getResolutions(parseClause('A'), parseClause('¬A | C'));
      expect(rs.length).to.equal(1);
      expect(rs[0].leftIdx).to.equal(0);
      expect(rs[0].rightIdx).to.equal(1);
    });

    it('should find no resolutions when atoms have different predicates', () => {
      expect(getResolutions(parseClause('P(x)'), parseClause('¬Q(x)'))).to.deep.equal([]);
    });

    it('should find no resolutions between literals of the same polarity', () => {
      expect(getResolutions(parseClause('P(x)'), parseClause('P(A)'))).to.deep.equal([]);
    });

    it('should record the unifier of the resolved atoms', () => {
      const rs = getResolutions(parseClause('¬P(x)'), parseClause('P(A)'));
      expect(rs.length).to.equal(1);
      expect(rs[0].sub.get('x')).to.deep.equal(mkConst('A'));
    });
  });

  describe('resolve', () => {
    it('should resolve complementary ground literals', () => {
      expect(keys(resolve(parseClause('A'), parseClause('¬A | C')))).to.deep.equal(['C']);
    });

    it('should derive the empty clause from a complementary pair', () => {
      const res = resolve(parseClause('A'), parseClause('¬A'));
      expect(keys(res)).to.deep.equal(['⊥']);
      expect(isEmptyClause(res[0])).to.be.true;
    });

    it('should return nothing when no literal pair is complementary', () => {
      expect(resolve(parseClause('A'), parseClause('B'))).to.deep.equal([]);
      expect(resolve(parseClause('A'), parseClause('A | B'))).to.deep.equal([]);
    });

    it('should resolve on every complementary pair', () => {
      const res = resolve(parseClause('A | B'), parseClause('¬A | ¬B'));
      expect(keys(res)).to.deep.equal(['B ∨ ¬B', 'A ∨ ¬A']);
    });

    it('should apply the unifier to the remaining literals', () => {
      const king = parseClause('¬King(x) | ¬Greedy(x) | Evil(x)');
      const res = resolve(king, parseClause('King(John)'));
      expect(keys(res)).to.deep.equal(['Evil(John) ∨ ¬Greedy(John)']);
    });

    it('should rename the second clause apart before unifying', () => {
      // without renaming, x against f(x) would fail the occurs check
      const res = resolve(parseClause('¬P(x) | Q(x)'), parseClause('P(f(x))'));
      expect(keys(res)).to.deep.equal(['Q(f(x))']);
    });

    it('should not bind variables shared by name across clauses', () => {
      const res = resolve(parseClause('¬P(x) | Q(x)'), parseClause('P(A) | R(x)'));
      expect(keys(res)).to.deep.equal(['Q(A) ∨ R(x)']);
    });

    it('should deduplicate resolvents', () => {
      const res = resolve(parseClause('P(x) | P(y)'), parseClause('¬P(A)'));
      expect(keys(res)).to.deep.equal(['P(x)']);
    });

    it('should not mutate its inputs', () => {
      const a = parseClause('¬P(x) | Q(x)');
      const b = parseClause('P(A)');
      resolve(a, b);
      expect(a.key).to.equal('Q(x) ∨ ¬P(x)');
      expect(b.key).to.equal('P(A)');
    });
  });

  describe('factoring', () => {
    it('should find factors of unifiable same-polarity literals', () => {
      const c = parseClause('P(x) | P(y)');
      const fs = getFactors(c);
      expect(fs.length).to.equal(1);
      expect(fs[0].idx1).to.equal(0);
      expect(fs[0].idx2).to.equal(1);
    });

    it('should merge the unified literals', () => {
      expect(keys(factor(parseClause('P(x) | P(y)')))).to.deep.equal(['P(x)']);
      expect(keys(factor(parseClause('P(x) | P(A) | Q(x)')))).to.deep.equal(['P(A) ∨ Q(A)']);
    });

    it('should find no factors otherwise', () => {
      expect(factor(parseClause('P(x) | Q(y)'))).to.deep.equal([]);
      expect(factor(parseClause('P(A) | P(B)'))).to.deep.equal([]);
      expect(factor(parseClause('P(x) | ¬P(A)'))).to.deep.equal([]);
    });
  });
});
