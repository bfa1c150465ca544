import pino from 'pino';
import pretty from 'pino-pretty';
import config, { type LogLevel } from '../config';

// stdout carries the rendered output, so every log line goes to stderr.
const STDERR = 2;

export const logger = pino(
  { name: 'hostglance', level: config.logLevel },
  config.env === 'production'
    ? pino.destination({ dest: STDERR, sync: true })
    : pretty({ colorize: true, destination: STDERR, sync: true, ignore: 'pid,hostname' }),
);

export function setLogLevel(level: LogLevel) {
  logger.level = level;
}
