import winston from 'winston';
import { appConfig } from '../config';
import { AdmissionDecision, Gate } from '../types';

const { loggingConfig } = appConfig;
const LOG_LEVEL = loggingConfig.level;
const LOG_FORMAT = loggingConfig.format;

// Custom format for structured logging
const structuredFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.metadata({ fillExcept: ['message', 'level', 'timestamp'] }),
  LOG_FORMAT === 'json'
    ? winston.format.json()
    : winston.format.printf(({ level, message, timestamp, metadata }) => {
        const meta =
          metadata && typeof metadata === 'object' && Object.keys(metadata).length
            ? JSON.stringify(metadata)
            : '';
        const ts = typeof timestamp === 'string' ? timestamp : '';
        const lvl = typeof level === 'string' ? level.toUpperCase() : 'INFO';
        const msg = typeof message === 'string' ? message : String(message);
        return `${ts} [${lvl}]: ${msg} ${meta}`;
      })
);

const logger = winston.createLogger({
  level: LOG_LEVEL,
  format: structuredFormat,
  defaultMeta: { service: 'translation-gateway', pid: process.pid },
  transports: [
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.colorize({ all: LOG_FORMAT !== 'json' }),
        structuredFormat
      ),
    }),
  ],
});

// Add file transports in production
if (loggingConfig.isProduction) {
  logger.add(
    new winston.transports.File({
      filename: 'logs/error.log',
      level: 'error',
      maxsize: 10485760, // 10MB
      maxFiles: 5,
    })
  );

  logger.add(
    new winston.transports.File({
      filename: 'logs/combined.log',
      maxsize: 10485760, // 10MB
      maxFiles: 10,
    })
  );
}

/**
 * Log a gate decision. Bypassed gates are not logged.
 */
export function logAdmissionDecision(gate: Gate, decision: AdmissionDecision) {
  if (!decision.enforced) {
    return;
  }

  logger.debug('Admission check', {
    gate,
    ...decision,
  });
}

/**
 * Log a translation that reached the backend
 */
export function logTranslation(context: {
  source: string;
  target: string;
  characters: number;
  latency_ms: number;
  outcome: 'ok' | 'bad_request' | 'internal_error';
}) {
  const level = context.outcome === 'internal_error' ? 'warn' : 'info';
  logger.log(level, 'Translation completed', context);
}

export default logger;
