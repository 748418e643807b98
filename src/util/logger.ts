// src/util/logger.ts

export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

const LEVEL_ORDER: readonly LogLevel[] = ['silent', 'error', 'warn', 'info', 'debug'];

export interface LoggerOptions {
   level?: LogLevel;
   /**
    * Optional prefix string (e.g. "[mkr]" or "[mkr][make]").
    */
   prefix?: string;
}

export function isLogLevel(value: unknown): value is LogLevel {
   return typeof value === 'string' && LEVEL_ORDER.some((level) => level === value);
}

/**
 * Read a level from an environment value, falling back when it is unset
 * or not one of the known levels.
 */
export function parseLogLevel(value: string | undefined, fallback: LogLevel = 'info'): LogLevel {
   const normalized = value?.trim().toLowerCase();
   return isLogLevel(normalized) ? normalized : fallback;
}

const supportsColor =
   typeof process !== 'undefined' &&
   Boolean(process.stdout?.isTTY) &&
   process.env.NO_COLOR === undefined;

type ColorFn = (text: string) => string;

function wrap(code: number): ColorFn {
   const open = `\u001b[${code}m`;
   const close = `\u001b[0m`;
   return (text: string) => (supportsColor ? `${open}${text}${close}` : text);
}

const color = {
   red: wrap(31),
   yellow: wrap(33),
   green: wrap(32),
   cyan: wrap(36),
   magenta: wrap(35),
   dim: wrap(2),
   bold: wrap(1),
};

function colorForLevel(level: LogLevel): ColorFn {
   switch (level) {
      case 'error':
         return color.red;
      case 'warn':
         return color.yellow;
      case 'info':
         return color.cyan;
      case 'debug':
         return color.dim;
      default:
         return (s) => s;
   }
}

/**
 * Leveled console logger with colored output. Child loggers share
 * their parent's level, so changing it on the root (e.g. from --quiet)
 * reaches every component.
 */
export class Logger {
   private readonly state: { level: LogLevel };
   private readonly prefix: string | undefined;

   constructor(options: LoggerOptions = {}, shared?: { level: LogLevel }) {
      this.state = shared ?? { level: options.level ?? 'info' };
      this.prefix = options.prefix;
   }

   setLevel(level: LogLevel) {
      this.state.level = level;
   }

   getLevel(): LogLevel {
      return this.state.level;
   }

   child(prefix: string): Logger {
      const combined = this.prefix ? `${this.prefix}${prefix}` : prefix;
      return new Logger({ prefix: combined }, this.state);
   }

   private formatMessage(msg: unknown, lvl: LogLevel): string {
      const text =
         typeof msg === 'string'
            ? msg
            : msg instanceof Error
               ? msg.message
               : String(msg);

      const body = colorForLevel(lvl)(text);
      return this.prefix ? `${color.magenta(this.prefix)} ${body}` : body;
   }

   private shouldLog(targetLevel: LogLevel): boolean {
      if (this.state.level === 'silent') return false;
      return LEVEL_ORDER.indexOf(targetLevel) <= LEVEL_ORDER.indexOf(this.state.level);
   }

   error(msg: unknown, ...rest: unknown[]) {
      if (!this.shouldLog('error')) return;
      console.error(this.formatMessage(msg, 'error'), ...rest);
   }

   warn(msg: unknown, ...rest: unknown[]) {
      if (!this.shouldLog('warn')) return;
      console.warn(this.formatMessage(msg, 'warn'), ...rest);
   }

   info(msg: unknown, ...rest: unknown[]) {
      if (!this.shouldLog('info')) return;
      console.log(this.formatMessage(msg, 'info'), ...rest);
   }

   debug(msg: unknown, ...rest: unknown[]) {
      if (!this.shouldLog('debug')) return;
      console.debug(this.formatMessage(msg, 'debug'), ...rest);
   }
}

/**
 * Process-wide logger used by the CLI and core.
 * Level can be controlled via the MKR_LOG_LEVEL env.
 */
export const defaultLogger = new Logger({
   level: parseLogLevel(process.env.MKR_LOG_LEVEL),
   prefix: '[mkr]',
});
