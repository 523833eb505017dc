import { winston } from "../deps.ts";

export type LevelName = 'error' | 'warn' | 'info' | 'debug';
export type LogFormat = 'json' | 'console';

function isLevelName(raw: string | undefined): raw is LevelName {
  return raw === 'error' || raw === 'warn' || raw === 'info' || raw === 'debug';
}

const envLevel = process.env.LOG_LEVEL;
const initialLevel: LevelName = isLevelName(envLevel) ? envLevel : 'info';

const consoleFormat = winston.format.printf(({ level, message }) =>
  `${level.toUpperCase()} ${message}`);

function makeTransport(format: LogFormat) {
  return new winston.transports.Console({
    format: format === 'json'
      ? winston.format.combine(winston.format.timestamp(), winston.format.json())
      : consoleFormat,
  });
}

/** The default logger */
export const log = winston.createLogger({
  level: initialLevel,
  transports: [makeTransport('console')],
});

/** Outbound API traffic, kept quieter than everything else */
export const httpLog = winston.createLogger({
  level: initialLevel == 'info' ? 'warn' : initialLevel,
  transports: [makeTransport('console')],
});

export function setupLogs(opts: {
  logLevel: LevelName,
  logFormat: LogFormat,
}) {
  log.configure({
    level: opts.logLevel,
    transports: [makeTransport(opts.logFormat)],
  });
  httpLog.configure({
    level: opts.logLevel == 'info' ? 'warn' : opts.logLevel,
    transports: [makeTransport(opts.logFormat)],
  });
}
