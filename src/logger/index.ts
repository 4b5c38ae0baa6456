/**
 * 统一日志系统 - 基线配置
 *
 * 功能:
 * - 结构化 JSON 日志输出（生产环境）
 * - 美化控制台输出（开发环境）
 * - 敏感信息自动脱敏
 * - 支持子日志器创建
 */

import pino, { Logger, LoggerOptions, DestinationStream } from 'pino';

// ==================== 配置常量 ====================

/** 默认日志级别 */
const DEFAULT_LOG_LEVEL = 'info';

/** 应用名称 */
const APP_NAME = 'bandit-allocation-service';

/** 需要脱敏的字段路径 */
const REDACT_PATHS = [
  'req.headers.authorization',
  'req.headers.cookie',
  '*.password',
  '*.token',
  '*.secret',
  '*.apiKey',
];

// ==================== 环境检测 ====================

// 日志器先于 env.ts 加载（env 校验本身要写日志），这里直接读取 process.env
const LOG_LEVEL = process.env.LOG_LEVEL || DEFAULT_LOG_LEVEL;
const NODE_ENV = process.env.NODE_ENV || 'development';
const IS_PRODUCTION = NODE_ENV === 'production';
const IS_TEST = NODE_ENV === 'test';

// ==================== 序列化器 ====================

/**
 * 请求序列化器 - 脱敏敏感信息
 *
 * 必须先浅拷贝 headers，否则会改写原始请求对象
 */
function reqSerializer(req: unknown): pino.SerializedRequest {
  const serialized = pino.stdSerializers.req(req as Parameters<typeof pino.stdSerializers.req>[0]);

  if (serialized?.headers) {
    serialized.headers = { ...serialized.headers };
    const headers = serialized.headers as Record<string, unknown>;
    if (headers.authorization) {
      headers.authorization = '[REDACTED]';
    }
    if (headers.cookie) {
      headers.cookie = '[REDACTED]';
    }
  }

  return serialized;
}

function resSerializer(res: unknown): pino.SerializedResponse {
  return pino.stdSerializers.res(res as Parameters<typeof pino.stdSerializers.res>[0]);
}

/**
 * 错误序列化器 - 保留错误码
 */
function errSerializer(err: Error): pino.SerializedError {
  const serialized = pino.stdSerializers.err(err);

  if ('code' in err && typeof err.code === 'string') {
    (serialized as pino.SerializedError & { code?: string }).code = err.code;
  }

  return serialized;
}

/** 序列化器集合 */
export const serializers = {
  req: reqSerializer,
  res: resSerializer,
  err: errSerializer,
};

// ==================== 日志器配置 ====================

function buildLoggerOptions(): LoggerOptions {
  return {
    level: LOG_LEVEL,

    base: {
      app: APP_NAME,
      env: NODE_ENV,
    },

    serializers,

    redact: {
      paths: REDACT_PATHS,
      censor: '[REDACTED]',
    },

    formatters: {
      level(label: string) {
        return { level: label };
      },
      bindings(bindings) {
        // 生产环境保留 pid/hostname 用于多实例定位
        if (IS_PRODUCTION) {
          return bindings;
        }
        return {
          ...bindings,
          pid: undefined,
          hostname: undefined,
        };
      },
    },

    timestamp: pino.stdTimeFunctions.isoTime,
  };
}

/**
 * 构建日志传输
 */
function buildTransport(): DestinationStream | undefined {
  // 测试环境直接输出 JSON
  if (IS_TEST) {
    return undefined;
  }

  const targets: pino.TransportTargetOptions[] = [];

  if (!IS_PRODUCTION) {
    targets.push({
      target: 'pino-pretty',
      level: LOG_LEVEL,
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        singleLine: false,
        ignore: 'pid,hostname',
        messageFormat: '{msg}',
      },
    });
  } else {
    targets.push({
      target: 'pino/file',
      level: LOG_LEVEL,
      options: { destination: 1 }, // stdout
    });
  }

  try {
    return pino.transport({ targets });
  } catch (err) {
    console.warn('[Logger] Failed to create transport, falling back to JSON output:', err);
    return undefined;
  }
}

// ==================== 创建日志器实例 ====================

export const logger: Logger = pino(buildLoggerOptions(), buildTransport());

// ==================== 子日志器工厂 ====================

/**
 * 子日志器绑定字段类型
 */
export interface LoggerBindings {
  /** 模块名称 */
  module?: string;
  /** 请求ID */
  requestId?: string;
  /** 其他自定义字段 */
  [key: string]: unknown;
}

/**
 * 创建子日志器
 *
 * @example
 * ```typescript
 * const log = createChildLogger({ module: 'bandit' });
 * log.info({ subtype: 'epsilon_first' }, '开始分配');
 * ```
 */
export function createChildLogger(bindings: LoggerBindings = {}): Logger {
  return logger.child(bindings);
}

// ==================== 预置模块日志器 ====================

/** Bandit 引擎日志器 */
export const banditLogger = createChildLogger({ module: 'bandit' });

/** 启动流程日志器 */
export const startupLogger = createChildLogger({ module: 'startup' });

/** 服务层日志器 */
export const serviceLogger = createChildLogger({ module: 'service' });

/**
 * 记录致命错误并退出进程
 *
 * 仅用于启动阶段，不要在请求处理路径中调用
 */
export function logFatal(err: Error, message?: string): never {
  logger.fatal({ err }, message || err.message);
  setImmediate(() => process.exit(1));
  throw err;
}

export type { Logger } from 'pino';
