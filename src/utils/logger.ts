import winston from 'winston';

// Log levels
const levels = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3
};

const colors = {
  error: 'red',
  warn: 'yellow',
  info: 'green',
  debug: 'white'
};

winston.addColors(colors);

const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss:ms' }),
  winston.format.colorize({ all: true }),
  winston.format.printf((info) => {
    const component = typeof info.component === 'string' ? ` [${info.component}]` : '';
    return `${info.timestamp} ${info.level}${component}: ${info.message}`;
  })
);

const transports: winston.transport[] = [
  new winston.transports.Console({
    format: consoleFormat,
    silent: process.env.LOG_SILENT === 'true'
  })
];

// File transport, only when LOG_FILE is set
if (process.env.LOG_FILE) {
  transports.push(
    new winston.transports.File({
      filename: process.env.LOG_FILE,
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.json()
      )
    })
  );
}

const rootLogger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  levels,
  transports,
  exitOnError: false
});

export default rootLogger;

export type LogMeta = Record<string, unknown>;

/**
 * Logging handle passed to every component at construction.
 * `child` scopes the `component` field of every entry it writes.
 */
export interface Logger {
  error(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  debug(message: string, meta?: LogMeta): void;
  child(component: string): Logger;
}

export function createLogger(component?: string, base: winston.Logger = rootLogger): Logger {
  const target = component ? base.child({ component }) : base;
  const write = (level: keyof typeof levels) => (message: string, meta?: LogMeta): void => {
    if (meta) {
      target.log(level, message, meta);
    } else {
      target.log(level, message);
    }
  };

  return {
    error: write('error'),
    warn: write('warn'),
    info: write('info'),
    debug: write('debug'),
    child: (name: string) => createLogger(component ? `${component}:${name}` : name, base)
  };
}

// Convenience helpers
export const log: Logger = createLogger();
