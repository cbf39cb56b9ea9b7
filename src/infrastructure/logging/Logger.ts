/**
 * Category logger for the replay components.
 *
 * Entries go to the console as text or JSON lines, or to a custom handler.
 * Warnings and errors use console.warn / console.error.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  [key: string]: unknown;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  category: string;
  message: string;
  context?: LogContext;
}

export interface LoggerConfig {
  /** Lowest level written (default: 'info') */
  minLevel: LogLevel;
  /** Prefix text lines with HH:MM:SS (default: false) */
  includeTimestamp: boolean;
  /** ANSI colors in text lines (default: true) */
  useColors: boolean;
  /** One JSON object per entry instead of text (default: false) */
  jsonOutput: boolean;
  /** Receives every entry instead of the console */
  customHandler?: (entry: LogEntry) => void;
}

const LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const ANSI = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  gray: '\x1b[90m',
  cyan: '\x1b[36m',
  yellow: '\x1b[33m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  blue: '\x1b[34m',
  white: '\x1b[37m',
} as const;

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: ANSI.gray,
  info: ANSI.cyan,
  warn: ANSI.yellow,
  error: ANSI.red,
};

const CATEGORY_COLORS: Record<string, string> = {
  Replay: ANSI.green,
  Browser: ANSI.blue,
  Config: ANSI.yellow,
  Event: ANSI.gray,
};

type ConsoleWriter = (line: string) => void;

/* eslint-disable no-console */
const WRITERS: Record<LogLevel, ConsoleWriter> = {
  debug: line => console.log(line),
  info: line => console.log(line),
  warn: line => console.warn(line),
  error: line => console.error(line),
};
/* eslint-enable no-console */

const DEFAULT_CONFIG: LoggerConfig = {
  minLevel: 'info',
  includeTimestamp: false,
  useColors: true,
  jsonOutput: false,
};

function formatContext(context: LogContext): string {
  return Object.entries(context)
    .map(([key, value]) => `${key}=${typeof value === 'string' ? value : JSON.stringify(value)}`)
    .join(' ');
}

export class Logger {
  private config: LoggerConfig;

  constructor(
    private readonly category: string,
    config: Partial<LoggerConfig> = {}
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  setLevel(level: LogLevel): void {
    this.config.minLevel = level;
  }

  debug(message: string, context?: LogContext): void {
    this.write('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.write('warn', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.write('error', message, context);
  }

  /**
   * Logger for `Category:subCategory`, sharing this logger's settings.
   */
  child(subCategory: string): Logger {
    return new Logger(`${this.category}:${subCategory}`, this.config);
  }

  private write(level: LogLevel, message: string, context?: LogContext): void {
    if (LEVELS.indexOf(level) < LEVELS.indexOf(this.config.minLevel)) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      category: this.category,
      message,
      context,
    };

    if (this.config.customHandler) {
      this.config.customHandler(entry);
    } else if (this.config.jsonOutput) {
      WRITERS.info(JSON.stringify(entry));
    } else {
      WRITERS[level](this.formatLine(entry));
    }
  }

  private formatLine(entry: LogEntry): string {
    const parts: string[] = [];

    if (this.config.includeTimestamp) {
      parts.push(this.paint(entry.timestamp.slice(11, 19), ANSI.dim));
    }

    // Child categories take the color of their root.
    const root = entry.category.split(':')[0];
    parts.push(this.paint(`[${entry.category}]`, CATEGORY_COLORS[root] ?? ANSI.white));
    parts.push(entry.message);

    if (entry.context && Object.keys(entry.context).length > 0) {
      parts.push(this.paint(`(${formatContext(entry.context)})`, ANSI.dim));
    }

    const line = parts.join(' ');
    return entry.level === 'warn' || entry.level === 'error'
      ? this.paint(line, LEVEL_COLORS[entry.level])
      : line;
  }

  private paint(text: string, color: string): string {
    return this.config.useColors ? `${color}${text}${ANSI.reset}` : text;
  }
}

let globalConfig: Partial<LoggerConfig> = {};

/**
 * Replaces the settings used by {@link getLogger} and {@link loggers}.
 */
export function setGlobalLoggerConfig(config: Partial<LoggerConfig>): void {
  globalConfig = config;
}

export function getLogger(category: string): Logger {
  return new Logger(category, globalConfig);
}

/**
 * Loggers for the project's categories. They read the global configuration
 * on every access, so {@link setGlobalLoggerConfig} applies to them as well.
 */
export const loggers = {
  get replay(): Logger {
    return getLogger('Replay');
  },
  get browser(): Logger {
    return getLogger('Browser');
  },
  get config(): Logger {
    return getLogger('Config');
  },
  get event(): Logger {
    return getLogger('Event');
  },
};
