/**
 * Component-scoped console logger.
 * Lines read `[Component] message {context}`; context is omitted when empty.
 */

export type LogContext = Record<string, unknown>;

type Level = 'info' | 'warn' | 'error';

const SINKS: Record<Level, (line: string) => void> = {
  info: (line) => console.log(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

function render(component: string, message: string, ctx?: LogContext): string {
  const hasContext = ctx !== undefined && Object.keys(ctx).length > 0;
  return hasContext ? `[${component}] ${message} ${JSON.stringify(ctx)}` : `[${component}] ${message}`;
}

/** Pulls a loggable message and stack out of whatever was thrown. */
export function errorContext(error: unknown): LogContext {
  if (error instanceof Error) {
    return { error: error.message, stack: error.stack };
  }
  return { error: String(error) };
}

export type Logger = Record<Level, (message: string, ctx?: LogContext) => void>;

export function createLogger(component: string): Logger {
  const at = (level: Level) => (message: string, ctx?: LogContext) =>
    SINKS[level](render(component, message, ctx));
  return { info: at('info'), warn: at('warn'), error: at('error') };
}
