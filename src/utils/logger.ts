import winston from 'winston';
import path from 'path';
import fs from 'fs';

const logLevel = process.env.LOG_LEVEL || 'info';
const logDir = process.env.LOG_DIR;
const silent = process.env.NODE_ENV === 'test' && !process.env.SHOW_LOGS;

// Label names and queries can carry addresses (e.g. a label per sender)
const PII_PATTERNS = [
  { pattern: /([a-zA-Z0-9_\-.]+)@([a-zA-Z0-9_\-.]+)\.([a-zA-Z]{2,5})/g, replacement: '[REDACTED_EMAIL]' },
  { pattern: /\b\d{1,3}\.\d{1,3}\.\d{1,3}\.\d{1,3}\b/g, replacement: '[REDACTED_IP]' },
];

/**
 * Redact PII from the serialized log entry.
 */
const redactPII = winston.format((info) => {
  let fullMessage = JSON.stringify(info);

  PII_PATTERNS.forEach(({ pattern, replacement }) => {
    fullMessage = fullMessage.replace(pattern, replacement);
  });

  try {
    const redacted: unknown = JSON.parse(fullMessage);
    return typeof redacted === 'object' && redacted !== null ? Object.assign(info, redacted) : info;
  } catch {
    return info;
  }
});

const transports: winston.transport[] = [
  // stdout is reserved for MCP JSON-RPC traffic
  new winston.transports.Console({
    stderrLevels: ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'],
    format: winston.format.combine(
      winston.format.colorize(),
      winston.format.simple()
    ),
  }),
];

if (logDir && !silent) {
  try {
    fs.mkdirSync(logDir, { recursive: true });
    transports.push(
      new winston.transports.File({
        filename: path.join(logDir, 'error.log'),
        level: 'error',
      }),
      new winston.transports.File({
        filename: path.join(logDir, 'combined.log'),
      })
    );
  } catch (error) {
    console.error('Failed to create log directory:', error);
  }
}

export const logger = winston.createLogger({
  level: logLevel,
  silent,
  format: winston.format.combine(
    winston.format.timestamp({
      format: 'YYYY-MM-DD HH:mm:ss',
    }),
    winston.format.errors({ stack: true }),
    winston.format.splat(),
    redactPII(),
    winston.format.json()
  ),
  defaultMeta: { service: 'mail-retention-engine' },
  transports,
  exitOnError: false,
});

/**
 * Child logger carrying the rule×label being processed.
 */
export function pairLogger(ruleId: number, label: string): winston.Logger {
  return logger.child({ ruleId, label });
}
