import winston from 'winston';
import { config } from '../config';

// Serialize bigint and Error values in log metadata.
const normalizeMeta = winston.format((info) => {
  for (const [key, value] of Object.entries(info)) {
    if (typeof value === 'bigint') {
      info[key] = value.toString();
    } else if (value instanceof Error) {
      info[key] = { name: value.name, message: value.message, stack: value.stack };
    }
  }
  return info;
});

export const logger = winston.createLogger({
  level: config.logging.level,
  format: winston.format.combine(
    normalizeMeta(),
    winston.format.timestamp(),
    winston.format.json()
  ),
  defaultMeta: { service: 'stable-core' },
  transports: [new winston.transports.Console()],
});
