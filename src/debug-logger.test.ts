import { expect } from 'chai';
import {
  DebugLogger,
  debugLogger,
  LogComponent,
  LogLevel,
  optionsFromEnv,
} from './debug-logger';
import { entails } from './index';

const LINE = /^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] \[(\w+)\] \[(\w+)\] (.*)$/;

function capture(level: LogLevel, filter: string[] | null = null) {
  const lines: string[] = [];
  const logger = new DebugLogger({
    enabled: true,
    level,
    componentFilter: filter ? new Set(filter) : null,
    sink: (line) => lines.push(line),
  });
  return { logger, lines };
}

describe('debug-logger', () => {
  describe('optionsFromEnv', () => {
    it('should be disabled by default', () => {
      const options = optionsFromEnv({});
      expect(options.enabled).to.be.false;
      expect(options.level).to.equal(LogLevel.DEBUG);
      expect(options.componentFilter).to.be.null;
    });

    it('should read level and filter', () => {
      const options = optionsFromEnv({
        DEBUG_PROVER: 'true',
        DEBUG_PROVER_LEVEL: 'trace',
        DEBUG_PROVER_FILTER: 'unify, prover',
      });
      expect(options.enabled).to.be.true;
      expect(options.level).to.equal(LogLevel.TRACE);
      expect(options.componentFilter).to.deep.equal(new Set(['UNIFY', 'PROVER']));
    });
  });

  describe('DebugLogger', () => {
    it('should format lines with level and component', () => {
      const { logger, lines } = capture(LogLevel.DEBUG);
      logger.debug(LogComponent.PROVER, 'hello');
      expect(lines.length).to.equal(1);
      const match = LINE.exec(lines[0]);
      expect(match?.slice(1)).to.deep.equal(['DEBUG', 'PROVER', 'hello']);
    });

    it('should drop messages below the level', () => {
      const { logger, lines } = capture(LogLevel.DEBUG);
      logger.trace(LogComponent.UNIFY, 'hidden');
      logger.info(LogComponent.UNIFY, 'shown');
      expect(lines.length).to.equal(1);
      expect(lines[0].endsWith('[INFO] [UNIFY] shown')).to.be.true;
    });

    it('should only log filtered components', () => {
      const { logger, lines } = capture(LogLevel.TRACE, ['UNIFY']);
      logger.info(LogComponent.PROVER, 'hidden');
      logger.trace(LogComponent.UNIFY, 'shown');
      expect(lines.length).to.equal(1);
      expect(logger.isEnabled(LogLevel.INFO, LogComponent.PROVER)).to.be.false;
    });

    it('should log nothing when disabled', () => {
      const { logger, lines } = capture(LogLevel.TRACE);
      logger.configure({ enabled: false });
      logger.info(LogComponent.PROVER, 'hidden');
      expect(lines).to.deep.equal([]);
    });

    it('should render clauses with their id', () => {
      const { logger, lines } = capture(LogLevel.DEBUG);
      logger.logClause(LogComponent.CLAUSE_MGMT, LogLevel.DEBUG, 'Added', { key: 'A', id: 3 });
      logger.logClause(LogComponent.CLAUSE_MGMT, LogLevel.DEBUG, 'Seen', { key: 'B' });
      logger.logClause(LogComponent.CLAUSE_MGMT, LogLevel.TRACE, 'Hidden', { key: 'C' });
      expect(lines.map((l) => LINE.exec(l)?.[3])).to.deep.equal(['Added #3: A', 'Seen: B']);
    });
  });

  describe('debugLogger', () => {
    afterEach(() => {
      debugLogger.configure(optionsFromEnv({}));
    });

    it('should report prover progress when enabled', () => {
      const lines: string[] = [];
      debugLogger.configure({
        enabled: true,
        level: LogLevel.INFO,
        componentFilter: new Set([LogComponent.PROVER]),
        sink: (line) => lines.push(line),
      });
      entails(['A', 'B'], 'C');
      expect(lines.map((l) => LINE.exec(l)?.[3])).to.deep.equal([
        'Starting proof of "C" from 2 clauses',
        'Finished "C": not-entailed after 1 iterations with 3 clauses',
      ]);
    });
  });
});
