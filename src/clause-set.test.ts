import { expect } from 'chai';
import { ClauseSet } from './clause-set';
import { mkLiteral, mkVar } from './ast';
import { createClause } from './resolution';
import { parseClause } from './parse';

function setOf(...clauses: string[]): ClauseSet {
  const set = new ClauseSet();
  for (const text of clauses) set.add(parseClause(text));
  return set;
}

const ids = (clauses: { id: number }[]) => clauses.map((c) => c.id);

describe('clause-set', () => {
  describe('ClauseSet', () => {
    it('should number clauses in insertion order', () => {
      const set = new ClauseSet();
      expect(set.add(parseClause('A'))?.id).to.equal(0);
      expect(set.add(parseClause('¬A | B'))?.id).to.equal(1);
      expect(set.size()).to.equal(2);
      expect(set.watermark()).to.equal(2);
    });

    it('should reject duplicates by key', () => {
      const set = setOf('P(x) | Q');
      expect(set.add(parseClause('Q | P(x)'))).to.be.undefined;
      expect(set.size()).to.equal(1);
      expect(set.watermark()).to.equal(1);
    });

    it('should look up clauses by key', () => {
      const set = setOf('A', 'B | ¬C');
      expect(set.has(parseClause('¬C | B'))).to.be.true;
      expect(set.has(parseClause('C'))).to.be.false;
      expect(set.get('B ∨ ¬C')?.id).to.equal(1);
      expect(set.get('C')).to.be.undefined;
    });

    it('should check containment of several clauses', () => {
      const set = setOf('A', 'B', 'C');
      expect(set.containsAll([parseClause('A'), parseClause('C')])).to.be.true;
      expect(set.containsAll([parseClause('A'), parseClause('D')])).to.be.false;
      expect(set.containsAll([])).to.be.true;
    });

    it('should report the empty clause', () => {
      const set = setOf('A');
      expect(set.hasEmptyClause()).to.be.false;
      set.add(createClause([]));
      expect(set.hasEmptyClause()).to.be.true;
    });

    it('should iterate in insertion order', () => {
      const set = setOf('C', 'A', 'B');
      expect([...set].map((c) => c.key)).to.deep.equal(['C', 'A', 'B']);
      expect(set.clauses().map((c) => c.key)).to.deep.equal(['C', 'A', 'B']);
    });
  });

  describe('candidates', () => {
    const set = setOf('P(A)', '¬P(x) | Q(x)', 'R(B)', '¬Q(B)');

    it('should return clauses with a complementary predicate', () => {
      expect(ids(set.candidates(parseClause('P(A)')))).to.deep.equal([1]);
      expect(ids(set.candidates(parseClause('¬R(x)')))).to.deep.equal([2]);
    });

    it('should combine partners of every literal ordered by id', () => {
      expect(ids(set.candidates(parseClause('Q(x) | ¬P(x)')))).to.deep.equal([0, 3]);
    });

    it('should ignore predicates with another arity', () => {
      expect(ids(set.candidates(parseClause('¬R(B,B)')))).to.deep.equal([]);
      expect(ids(set.candidates(parseClause('¬R')))).to.deep.equal([]);
    });

    it('should exclude the clause itself', () => {
      const own = setOf('A | ¬A', '¬A');
      expect(ids(own.candidates(parseClause('A | ¬A')))).to.deep.equal([1]);
    });

    it('should match variable atoms with anything of opposite polarity', () => {
      const withVar = setOf('P(A)');
      withVar.add(createClause([mkLiteral(mkVar('x'))]));
      withVar.add(parseClause('¬Q(B)'));
      expect(ids(withVar.candidates(parseClause('¬R(A)')))).to.deep.equal([1]);
      expect(ids(withVar.candidates(parseClause('¬P(B)')))).to.deep.equal([0, 1]);
      expect(ids(withVar.candidates(createClause([mkLiteral(mkVar('y'), true)])))).to.deep.equal([
        0, 1,
      ]);
    });

    it('should index a bare lowercase literal as a predicate', () => {
      const props = setOf('p', '¬q', 'R(A)');
      expect(ids(props.candidates(parseClause('¬p')))).to.deep.equal([0]);
      expect(ids(props.candidates(parseClause('¬R(A)')))).to.deep.equal([2]);
      expect(ids(props.candidates(parseClause('q')))).to.deep.equal([1]);
    });
  });
});
