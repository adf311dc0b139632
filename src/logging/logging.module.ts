import { randomUUID } from 'node:crypto';
import { existsSync, mkdirSync } from 'node:fs';
import { join } from 'node:path';
import { Global, Module, RequestMethod } from '@nestjs/common';
import { ClsServiceManager } from 'nestjs-cls';
import { LoggerModule } from 'nestjs-pino';
import type { TransportTargetOptions } from 'pino';
import { CLS_KEYS } from '../common/cls.service';

const isProd = process.env.NODE_ENV === 'production';
const usePrettyLogs = process.env.LOG_PRETTY === 'true' || !isProd;
const enableFileLogging = process.env.LOG_FILE === 'true';
const logDir = process.env.LOG_DIR || './logs';
const logLevel = process.env.LOG_LEVEL || (isProd ? 'info' : 'debug');

// Ensure log directory exists if file logging is enabled
if (enableFileLogging && !existsSync(logDir)) {
  mkdirSync(logDir, { recursive: true });
}

/**
 * Build transport targets based on configuration.
 * Supports console (with optional pretty printing) and file logging.
 */
function buildTransportTargets(): TransportTargetOptions[] {
  const targets: TransportTargetOptions[] = [];

  if (usePrettyLogs) {
    targets.push({
      target: 'pino-pretty',
      options: {
        colorize: true,
        singleLine: false,
        translateTime: 'SYS:standard',
      },
      level: logLevel,
    });
  } else {
    targets.push({
      target: 'pino/file',
      options: { destination: 1 }, // stdout
      level: logLevel,
    });
  }

  if (enableFileLogging) {
    targets.push({
      target: 'pino/file',
      options: { destination: join(logDir, 'chat-lifecycle.log') },
      level: logLevel,
    });
  }

  return targets;
}

/**
 * Adds the tenant and chat of the job being processed to every log line.
 * Outside of a CLS context this contributes nothing.
 */
function conversationMixin(): Record<string, string> {
  const cls = ClsServiceManager.getClsService();
  if (!cls.isActive()) return {};

  const fields: Record<string, string> = {};
  const tenantId = cls.get<string | undefined>(CLS_KEYS.TENANT_ID);
  const chatId = cls.get<string | undefined>(CLS_KEYS.CHAT_ID);
  if (tenantId) fields.tenantId = tenantId;
  if (chatId) fields.chatId = chatId;
  return fields;
}

const PinoLoggerModule = LoggerModule.forRoot({
  pinoHttp: {
    level: logLevel,
    transport: { targets: buildTransportTargets() },
    mixin: conversationMixin,
    customAttributeKeys: {
      req: 'request',
      res: 'response',
      err: 'error',
    },
    genReqId: req => {
      const header = req.headers['x-request-id'];
      return typeof header === 'string' && header ? header : randomUUID();
    },
    autoLogging: {
      ignore: req => req.url === '/health/liveness',
    },
    redact: ['request.headers.authorization', 'request.headers["x-api-key"]'],
  },
  exclude: [{ method: RequestMethod.GET, path: '/health/liveness' }],
});

/**
 * Global logging module that makes PinoLogger available throughout the application.
 *
 * Configuration via environment variables:
 * - LOG_LEVEL: Log level (default: 'debug' in dev, 'info' in prod)
 * - LOG_PRETTY: Enable pretty printing (default: true in dev)
 * - LOG_FILE: Enable file logging (default: false)
 * - LOG_DIR: Directory for log files (default: './logs')
 */
@Global()
@Module({
  imports: [PinoLoggerModule],
  exports: [PinoLoggerModule],
})
export class LoggingModule {}
