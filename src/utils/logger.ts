import pino from 'pino';
import { config } from '../config';
import fs from 'fs';
import path from 'path';

const targets: pino.TransportTargetOptions[] = [];

if (config.isProduction) {
  const logDir = path.dirname(config.logging.file);
  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }

  targets.push({
    target: 'pino/file',
    options: { destination: config.logging.file },
  });
} else if (!config.isTest) {
  targets.push({
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'SYS:standard',
      ignore: 'pid,hostname',
    },
  });
}

export const logger = pino({
  level: config.logging.level,
  transport: targets.length > 0 ? { targets } : undefined,
});

export const crawlerLogger = logger.child({ module: 'crawler' });
export const dbLogger = logger.child({ module: 'database' });
export const parserLogger = logger.child({ module: 'parser' });
export const exportLogger = logger.child({ module: 'export' });
