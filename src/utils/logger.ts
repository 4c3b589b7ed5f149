import winston from 'winston';
import path from 'path';
import { config } from './config';

const SERVICE_NAME = 'pg-dependents';

const logFormat = winston.format.combine(
  winston.format.timestamp({
    format: 'YYYY-MM-DD HH:mm:ss',
  }),
  winston.format.errors({ stack: true }),
  winston.format.json()
);

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({
    format: 'HH:mm:ss',
  }),
  winston.format.printf(({ timestamp, level, message, component, ...meta }) => {
    const extraKeys = Object.keys(meta).filter(key => key !== 'service');

    let output = `${timestamp} [${level}]: ${message}`;

    if (component) {
      output += ` (${component})`;
    }

    if (extraKeys.length > 0) {
      const extra: Record<string, unknown> = {};
      for (const key of extraKeys) {
        extra[key] = meta[key];
      }

      // Keep console lines short; the file transport has everything
      const serialized = JSON.stringify(extra);
      if (serialized.length < 200) {
        output += ` ${serialized}`;
      }
    }

    return output;
  })
);

export const logger = winston.createLogger({
  level: config.logging.level,
  format: logFormat,
  defaultMeta: { service: SERVICE_NAME },
  transports: [
    // stdout carries the reports, so every console level goes to stderr
    new winston.transports.Console({
      format: consoleFormat,
      stderrLevels: Object.keys(winston.config.npm.levels),
      silent: config.nodeEnv === 'test',
    }),
  ],
});

if (config.logging.file) {
  logger.add(
    new winston.transports.File({
      filename: config.logging.file,
      maxsize: 5 * 1024 * 1024, // 5MB
      maxFiles: 5,
    })
  );
  logger.add(
    new winston.transports.File({
      filename: path.join(path.dirname(config.logging.file), 'error.log'),
      level: 'error',
      maxsize: 5 * 1024 * 1024,
      maxFiles: 5,
    })
  );
}

export const createComponentLogger = (component: string): winston.Logger => {
  return logger.child({ component });
};

export const flushLogs = async (): Promise<void> => {
  return new Promise(resolve => {
    setImmediate(() => {
      setTimeout(resolve, 50);
    });
  });
};
