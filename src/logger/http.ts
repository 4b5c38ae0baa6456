/**
 * HTTP 请求日志中间件
 *
 * 功能:
 * - 为每个请求分配唯一 requestId
 * - 记录请求/响应元数据
 * - 健康检查路径静默处理
 * - 根据状态码自动选择日志级别
 */

import { RequestHandler } from 'express';
import { IncomingMessage, ServerResponse } from 'http';
import pinoHttp, { HttpLogger, Options } from 'pino-http';
import { v4 as uuidv4 } from 'uuid';
import { logger, serializers } from './index';

/** 不记录日志的路径 */
const SILENT_PATHS = ['/health', '/favicon.ico'];

function shouldSilence(path: string): boolean {
  return SILENT_PATHS.includes(path);
}

/**
 * 根据响应状态码确定日志级别
 */
function determineLogLevel(
  _req: IncomingMessage,
  res: ServerResponse,
  err?: Error
): 'error' | 'warn' | 'info' {
  if (err || res.statusCode >= 500) {
    return 'error';
  }
  if (res.statusCode >= 400) {
    return 'warn';
  }
  return 'info';
}

/**
 * 生成或提取请求 ID，优先使用上游传递的 X-Request-ID
 */
function generateRequestId(req: IncomingMessage): string {
  const existingId = req.headers['x-request-id'];
  if (typeof existingId === 'string' && existingId.length > 0) {
    return existingId;
  }
  return uuidv4();
}

function buildHttpLoggerOptions(): Options {
  return {
    logger,
    serializers,

    // 复用 requestIdMiddleware 预先注入的 req.id
    genReqId: (req: IncomingMessage) => {
      const id = req.id;
      return typeof id === 'string' && id.length > 0 ? id : generateRequestId(req);
    },

    customProps: (req: IncomingMessage) => ({
      requestId: req.id,
    }),

    autoLogging: {
      ignore: (req: IncomingMessage) => shouldSilence(req.url || ''),
    },

    customLogLevel: determineLogLevel,

    customSuccessMessage: (req: IncomingMessage, res: ServerResponse) =>
      `${req.method} ${req.url} ${res.statusCode}`,

    customErrorMessage: (req: IncomingMessage, res: ServerResponse, err: Error) =>
      `${req.method} ${req.url} ${res.statusCode} - ${err.message}`,

    customAttributeKeys: {
      req: 'request',
      res: 'response',
      err: 'error',
      responseTime: 'duration',
    },
  };
}

let httpLoggerInstance: HttpLogger | null = null;

/**
 * 获取 HTTP 日志中间件（单例）
 */
export function getHttpLogger(): HttpLogger {
  if (!httpLoggerInstance) {
    httpLoggerInstance = pinoHttp(buildHttpLoggerOptions());
  }
  return httpLoggerInstance;
}

/**
 * 请求 ID 注入中间件
 */
export const requestIdMiddleware: RequestHandler = (req, res, next) => {
  const requestId = generateRequestId(req);
  req.id = requestId;
  res.setHeader('X-Request-ID', requestId);
  next();
};

/**
 * 组合的日志中间件：requestId 注入 + HTTP 日志
 */
export const httpLoggerMiddleware: RequestHandler = (req, res, next) => {
  requestIdMiddleware(req, res, (err?: unknown) => {
    if (err) {
      return next(err);
    }
    getHttpLogger()(req, res, next);
  });
};
