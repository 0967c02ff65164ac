/**
 * Structured Logging Module
 *
 * Provides:
 * - Structured JSON logging with pino
 * - Sensitive data redaction
 * - Context field support (userId, attemptId, jobId)
 * - Request and job correlation via AsyncLocalStorage
 */

import pino, { type Logger as PinoLogger } from 'pino';
import { AsyncLocalStorage } from 'async_hooks';
import { env } from './env';

// Sensitive field patterns to redact
const REDACT_PATHS = [
  'password',
  'token',
  'secret',
  'authorization',
  'cookie',
  'req.headers.authorization',
  'req.headers.cookie',
  '*.password',
  '*.token',
  '*.secret',
];

interface SerializableRequest {
  method?: string;
  url?: string;
  ip?: string;
  params?: unknown;
  headers?: Record<string, string | string[] | undefined>;
}

interface SerializableReply {
  statusCode?: number;
}

const serializers = {
  req: (req: SerializableRequest) => ({
    method: req.method,
    url: req.url,
    parameters: req.params,
    headers: {
      host: req.headers?.host,
      'user-agent': req.headers?.['user-agent'],
      'x-request-id': req.headers?.['x-request-id'],
    },
    remoteAddress: req.ip,
  }),
  res: (res: SerializableReply) => ({
    statusCode: res.statusCode,
  }),
  err: pino.stdSerializers.err,
};

function resolveLevel(): pino.LevelWithSilent {
  if (env.LOG_LEVEL) {
    return env.LOG_LEVEL;
  }
  if (env.NODE_ENV === 'test') {
    return 'silent';
  }
  return env.NODE_ENV === 'production' ? 'info' : 'debug';
}

// Development transport for pretty printing
const devTransport: pino.TransportSingleOptions = {
  target: 'pino-pretty',
  options: {
    colorize: true,
    translateTime: 'SYS:standard',
    ignore: 'pid,hostname,service,version',
    messageFormat: '{requestId} {msg}',
    errorLikeObjectKeys: ['err', 'error'],
  },
};

/**
 * Shared options. Fastify builds its own instance from these so request
 * logs and application logs share one format.
 */
export const loggerOptions: pino.LoggerOptions = {
  level: resolveLevel(),

  redact: {
    paths: REDACT_PATHS,
    censor: '[REDACTED]',
  },

  base: {
    env: env.NODE_ENV,
    service: 'questline-api',
    version: process.env.npm_package_version || '0.1.0',
  },

  serializers,

  formatters: {
    level: (label) => ({ level: label }),
  },

  timestamp: pino.stdTimeFunctions.isoTime,

  transport: env.NODE_ENV === 'development' ? devTransport : undefined,
};

export const logger = pino(loggerOptions);

export type Logger = PinoLogger;

/**
 * Context fields that can be added to log entries
 */
export interface LogContext {
  requestId?: string;
  userId?: string;
  attemptId?: string;
  challengeId?: string;
  badgeId?: string;
  jobId?: string;
  [key: string]: string | number | boolean | undefined;
}

export function createContextLogger(context: LogContext): PinoLogger {
  return logger.child(context);
}

/**
 * Async local storage for request and job context.
 * HTTP hooks and the award worker both run their handlers inside it.
 */
export interface RequestContext {
  requestId: string;
  userId?: string;
  attemptId?: string;
  logger: PinoLogger;
}

export const requestContext = new AsyncLocalStorage<RequestContext>();

/**
 * Falls back to the base logger outside a request or job
 */
export function getContextLogger(): PinoLogger {
  const ctx = requestContext.getStore();
  return ctx?.logger || logger;
}

export function getCurrentContext(): RequestContext | undefined {
  return requestContext.getStore();
}

/**
 * Audit log for administrative operations
 */
export function auditLog(
  action: string,
  details: {
    userId?: string;
    targetId?: string;
    targetType?: string;
    result: 'success' | 'failure';
    reason?: string;
    metadata?: Record<string, unknown>;
  }
): void {
  const ctx = getCurrentContext();
  const auditLogger = logger.child({
    audit: true,
    requestId: ctx?.requestId,
  });

  auditLogger.info(
    {
      action,
      ...details,
    },
    `AUDIT: ${action} - ${details.result}`
  );
}
