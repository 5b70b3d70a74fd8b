/**
 * Debug logging system for the resolution prover.
 * Controlled by environment variables:
 * - DEBUG_PROVER=true to enable debug logging
 * - DEBUG_PROVER_LEVEL=TRACE|DEBUG|INFO (default: DEBUG)
 * - DEBUG_PROVER_FILTER=unify,resolution,... (comma-separated components)
 */

export enum LogLevel {
  TRACE = 0,
  DEBUG = 1,
  INFO = 2,
}

export enum LogComponent {
  PARSE = 'PARSE',
  UNIFY = 'UNIFY',
  RESOLUTION = 'RESOLUTION',
  FACTORING = 'FACTORING',
  CLAUSE_MGMT = 'CLAUSE_MGMT',
  PROVER = 'PROVER',
  DECISION_TREE = 'DECISION_TREE',
}

export interface LoggerOptions {
  enabled: boolean;
  level: LogLevel;
  /** Components to log, or null for all of them. */
  componentFilter: Set<string> | null;
  sink: (line: string) => void;
}

function parseLevel(levelStr: string | undefined): LogLevel {
  switch ((levelStr ?? '').trim().toUpperCase()) {
    case 'TRACE':
      return LogLevel.TRACE;
    case 'INFO':
      return LogLevel.INFO;
    default:
      return LogLevel.DEBUG;
  }
}

/**
 * Reads logger options from the environment.
 */
export function optionsFromEnv(env: NodeJS.ProcessEnv): LoggerOptions {
  const filterStr = env.DEBUG_PROVER_FILTER;
  return {
    enabled: env.DEBUG_PROVER === 'true',
    level: parseLevel(env.DEBUG_PROVER_LEVEL),
    componentFilter: filterStr
      ? new Set(filterStr.split(',').map((s) => s.trim().toUpperCase()))
      : null,
    sink: (line) => console.log(line),
  };
}

export class DebugLogger {
  private options: LoggerOptions;

  constructor(options: LoggerOptions) {
    this.options = options;
  }

  /**
   * Overrides some of the options, mostly for the CLI and tests.
   */
  configure(options: Partial<LoggerOptions>): void {
    this.options = { ...this.options, ...options };
  }

  isEnabled(level: LogLevel, component: LogComponent): boolean {
    const { enabled, level: minLevel, componentFilter } = this.options;
    if (!enabled) return false;
    if (level < minLevel) return false;
    if (componentFilter && !componentFilter.has(component)) return false;
    return true;
  }

  private formatMessage(
    level: LogLevel,
    component: LogComponent,
    message: string
  ): string {
    const timestamp = new Date().toISOString();
    const levelStr = LogLevel[level];
    return `[${timestamp}] [${levelStr}] [${component}] ${message}`;
  }

  trace(component: LogComponent, message: string): void {
    this.log(LogLevel.TRACE, component, message);
  }

  debug(component: LogComponent, message: string): void {
    this.log(LogLevel.DEBUG, component, message);
  }

  info(component: LogComponent, message: string): void {
    this.log(LogLevel.INFO, component, message);
  }

  // Utility method to log clause details, rendering only when enabled
  logClause(
    component: LogComponent,
    level: LogLevel,
    prefix: string,
    clause: { key: string; id?: number }
  ): void {
    if (!this.isEnabled(level, component)) return;

    let message = prefix;
    if (clause.id !== undefined) {
      message += ` #${clause.id}`;
    }
    message += `: ${clause.key}`;

    this.log(level, component, message);
  }

  private log(level: LogLevel, component: LogComponent, message: string): void {
    if (this.isEnabled(level, component)) {
      this.options.sink(this.formatMessage(level, component, message));
    }
  }
}

// Singleton instance
export const debugLogger = new DebugLogger(optionsFromEnv(process.env));
