/**
 * Logger: electron-log (Node entry) configured for procdoc.
 *
 * Components take a scoped logger (`createLogger('FrameExtractor')`) so
 * every line carries its origin. In MCP mode stdout is reserved for JSON-RPC
 * traffic, so console output is redirected to stderr.
 */

import log from 'electron-log/node';

export type LogLevel = 'error' | 'warn' | 'info' | 'verbose' | 'debug';

export type ScopedLogger = ReturnType<typeof log.scope>;

export interface LoggingOptions {
  level?: LogLevel;
  /** Append log lines to this file in addition to the console */
  file?: string;
  /** Send console output to stderr (MCP stdio transport, CLI) */
  stderr?: boolean;
  /** Tag written before each stderr line */
  prefix?: string;
}

export function configureLogging(options: LoggingOptions = {}): void {
  const level = options.level ?? 'info';

  log.transports.console.level = level;

  const file = options.file;
  if (file) {
    log.transports.file.level = level;
    log.transports.file.resolvePathFn = () => file;
  } else {
    log.transports.file.level = false;
  }

  if (options.stderr) {
    const prefix = options.prefix ?? 'procdoc';
    log.transports.console.writeFn = ({ message }) => {
      const scope = message.scope ? ` (${message.scope})` : '';
      const text = message.data.map((part: unknown) => formatPart(part)).join(' ');
      process.stderr.write(`[${prefix}] ${message.level}${scope} ${text}\n`);
    };
  }
}

export function createLogger(scope: string): ScopedLogger {
  return log.scope(scope);
}

function formatPart(part: unknown): string {
  if (typeof part === 'string') return part;
  if (part instanceof Error) return part.message;
  try {
    return JSON.stringify(part);
  } catch {
    return String(part);
  }
}

export default log;
