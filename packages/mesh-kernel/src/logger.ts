/**
 * hexdict logger — consistent, component-prefixed console output.
 *
 * Log levels:
 * - error, warn: always logged
 * - info, debug: logged only when HEXDICT_DEBUG=true
 *
 * Everything goes to stderr. The MCP server speaks its protocol on stdout,
 * so nothing here may write there.
 */

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface LogContext {
  /** Component/module name (e.g., 'Mesh', 'Document') */
  component: string;
  /** Operation being performed (e.g., 'addBlock') */
  operation?: string;
  /** Additional context data */
  data?: Record<string, unknown>;
}

export interface Logger {
  error(message: string, error?: unknown, ctx?: Partial<LogContext>): void;
  warn(message: string, ctx?: Partial<LogContext>): void;
  info(message: string, ctx?: Partial<LogContext>): void;
  debug(message: string, ctx?: Partial<LogContext>): void;
}

function isDebugEnabled(): boolean {
  return typeof process !== 'undefined' && process.env.HEXDICT_DEBUG === 'true';
}

function formatContext(ctx: LogContext): string {
  let prefix = `[${ctx.component}]`;
  if (ctx.operation) {
    prefix += ` ${ctx.operation}`;
  }
  return prefix;
}

function formatError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}${error.stack ? `\n${error.stack}` : ''}`;
  }
  return String(error);
}

function write(prefix: string, message: string, data?: Record<string, unknown>): void {
  if (data !== undefined) {
    console.error(`${prefix} ${message}`, data);
  } else {
    console.error(`${prefix} ${message}`);
  }
}

/** Create a logger instance for a specific component. */
export function createLogger(component: string): Logger {
  return {
    error(message, error, ctx) {
      const prefix = formatContext({ component, ...ctx });
      if (error !== undefined) {
        write(prefix, `${message}: ${formatError(error)}`, ctx?.data);
      } else {
        write(prefix, message, ctx?.data);
      }
    },

    warn(message, ctx) {
      write(formatContext({ component, ...ctx }), message, ctx?.data);
    },

    info(message, ctx) {
      if (!isDebugEnabled()) return;
      write(formatContext({ component, ...ctx }), message, ctx?.data);
    },

    debug(message, ctx) {
      if (!isDebugEnabled()) return;
      write(`${formatContext({ component, ...ctx })} [debug]`, message, ctx?.data);
    },
  };
}
