import winston from 'winston';
import chalk from 'chalk';
import { env } from '../config';

const { combine, timestamp, printf, errors } = winston.format;

type LevelName = 'error' | 'warn' | 'info' | 'http' | 'debug';

const levelColors: Record<LevelName, chalk.Chalk> = {
  error: chalk.red,
  warn: chalk.yellow,
  info: chalk.blue,
  http: chalk.magenta,
  debug: chalk.cyan,
};

const levelBrightColors: Record<LevelName, chalk.Chalk> = {
  error: chalk.redBright,
  warn: chalk.yellowBright,
  info: chalk.blueBright,
  http: chalk.magentaBright,
  debug: chalk.cyanBright,
};

const levelIcons: Record<LevelName, string> = {
  error: '❌',
  warn: '⚠️ ',
  info: 'ℹ️ ',
  http: '🌐',
  debug: '🔍',
};

const isLevelName = (level: string): level is LevelName => level in levelColors;

const TIMESTAMP_FORMAT = 'YYYY-MM-DD HH:mm:ss';

// Colorized console line: [ts] icon [LEVEL] message
const colorizedFormat = printf(({ level, message, timestamp: ts, stack }) => {
  const color = isLevelName(level) ? levelColors[level] : chalk.white;
  const brightColor = isLevelName(level) ? levelBrightColors[level] : chalk.whiteBright;
  const icon = isLevelName(level) ? levelIcons[level] : '📝';

  const timestampStr = chalk.gray(`[${String(ts)}]`);
  const levelStr = color(`[${level.toUpperCase()}]`);
  const formattedMessage = typeof message === 'string' ? brightColor(message) : String(message);

  return stack
    ? `${timestampStr} ${icon} ${levelStr} ${formattedMessage}\n${chalk.red(String(stack))}`
    : `${timestampStr} ${icon} ${levelStr} ${formattedMessage}`;
});

// Plain format for log files
const fileFormat = printf(({ level, message, timestamp: ts, stack }) => {
  return `${String(ts)} [${level.toUpperCase()}]: ${String(stack ?? message)}`;
});

export const logger = winston.createLogger({
  level: env.LOG_LEVEL,
  format: combine(timestamp({ format: TIMESTAMP_FORMAT }), errors({ stack: true })),
  defaultMeta: { service: 'ingest-reconciler' },
  transports: [
    new winston.transports.Console({
      format: combine(
        timestamp({ format: TIMESTAMP_FORMAT }),
        errors({ stack: true }),
        colorizedFormat
      ),
    }),
  ],
});

if (env.NODE_ENV === 'production') {
  const fileTransportFormat = combine(
    timestamp({ format: TIMESTAMP_FORMAT }),
    errors({ stack: true }),
    fileFormat
  );
  logger.add(
    new winston.transports.File({
      filename: 'logs/error.log',
      level: 'error',
      format: fileTransportFormat,
    })
  );
  logger.add(new winston.transports.File({ filename: 'logs/reconciler.log', format: fileTransportFormat }));
}

const stringify = (args: unknown): string =>
  typeof args === 'string' ? args : JSON.stringify(args, null, 2);

/**
 * Console helpers for operator-facing start-up and summary output.
 */
export class Logging {
  public static info = (args: unknown): void => {
    logger.info(stringify(args));
  };

  public static success = (args: unknown): void => {
    const ts = new Date().toISOString().replace('T', ' ').substring(0, 19);
    // eslint-disable-next-line no-console
    console.log(chalk.gray(`[${ts}]`), '✅', chalk.green('[SUCCESS]'), chalk.greenBright(stringify(args)));
  };

  public static box = (title: string, message: string): void => {
    const width = Math.max(50, title.length + 2, message.length + 2);
    const line = '═'.repeat(width);
    // eslint-disable-next-line no-console
    console.log(
      [
        chalk.cyan(`╔${line}╗`),
        chalk.cyan('║') + chalk.bold.cyanBright(` ${title.padEnd(width - 1)}`) + chalk.cyan('║'),
        chalk.cyan(`╠${line}╣`),
        chalk.cyan('║') + chalk.white(` ${message.padEnd(width - 1)}`) + chalk.cyan('║'),
        chalk.cyan(`╚${line}╝`),
      ].join('\n')
    );
  };
}

export default logger;
