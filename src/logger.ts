/**
 * Log helpers. Everything goes to stderr: in stdio transport mode stdout
 * carries the MCP JSON-RPC stream and must not be polluted.
 */

type LogContext = Record<string, unknown>;
type LoggerFn = (message: string, context?: LogContext) => void;

const PREFIX = "[MCQ]";
let verboseEnabled = false;

/** Enable or disable `logVerbose` output (set once from configuration). */
export function setVerboseLogging(enabled: boolean): void {
  verboseEnabled = enabled;
}

const emit = (prefix: string, message: string, context?: LogContext): void => {
  if (context && Object.keys(context).length > 0) {
    console.error(`${prefix} ${message}`, context);
    return;
  }
  console.error(`${prefix} ${message}`);
};

export const logInfo: LoggerFn = (message, context) => emit(PREFIX, message, context);
export const logWarning: LoggerFn = (message, context) => emit(`${PREFIX}[warn]`, message, context);
export const logError: LoggerFn = (message, context) => emit(`${PREFIX}[error]`, message, context);
export const logVerbose: LoggerFn = (message, context) => {
  if (verboseEnabled) emit(`${PREFIX}[verbose]`, message, context);
};
