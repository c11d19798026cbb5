// Configure logging level
// Check for command line arguments like --log=debug
const logArgMatch = process.argv.find(arg => arg.startsWith('--log='))?.match(/--log=(\w+)/);
const logArgValue = logArgMatch ? logArgMatch[1] : null;

const validLogLevels = ['error', 'warn', 'info', 'debug'] as const;
export type LogLevel = (typeof validLogLevels)[number];

function isLogLevel(value: string): value is LogLevel {
  return (validLogLevels as readonly string[]).includes(value);
}

// Priority: command line arg > environment variable > default
const rawLogLevel = logArgValue || process.env.LOG_LEVEL || 'info';

let LOG_LEVEL: LogLevel = 'info';
if (isLogLevel(rawLogLevel)) {
  LOG_LEVEL = rawLogLevel;
} else {
  console.warn(`Invalid log level: ${rawLogLevel}. Using 'info' instead.`);
}

const order: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

// Function to determine if a message at the given level should be logged
function shouldLog(level: LogLevel): boolean {
  return order[level] >= order[LOG_LEVEL];
}

export interface Logger {
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  debug(message: string, ...args: unknown[]): void;
}

/**
 * Leveled console logger. The scope is printed after the timestamp so that
 * server and client lines can be told apart in a shared terminal.
 */
function createLogger(scope?: string): Logger {
  const prefix = scope ? `[${scope}] ` : '';
  return {
    info: (message, ...args) => {
      if (shouldLog('info')) {
        console.log(`[INFO] ${new Date().toISOString()} - ${prefix}${message}`, ...args);
      }
    },
    error: (message, ...args) => {
      if (shouldLog('error')) {
        console.error(`[ERROR] ${new Date().toISOString()} - ${prefix}${message}`, ...args);
      }
    },
    warn: (message, ...args) => {
      if (shouldLog('warn')) {
        console.warn(`[WARN] ${new Date().toISOString()} - ${prefix}${message}`, ...args);
      }
    },
    debug: (message, ...args) => {
      if (shouldLog('debug')) {
        console.debug(`[DEBUG] ${new Date().toISOString()} - ${prefix}${message}`, ...args);
      }
    }
  };
}

const logger = createLogger();

export { logger, createLogger, LOG_LEVEL };
