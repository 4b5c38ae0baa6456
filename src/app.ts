import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import { env } from './config/env';
import { httpLoggerMiddleware } from './logger/http';
import { logger } from './logger';
import { errorHandler, notFoundHandler } from './middleware/error.middleware';
import banditRoutes from './routes/bandit.routes';
import healthRoutes from './routes/health.routes';

const app = express();

// 反向代理配置：仅在明确配置时启用，否则可伪造 X-Forwarded-For 绕过限流
if (env.TRUST_PROXY !== false) {
  app.set('trust proxy', env.TRUST_PROXY);
  logger.info({ trustProxy: env.TRUST_PROXY }, 'Trust proxy enabled');
}

// 请求日志 - 前置以捕获所有请求（包括解析失败的请求）
app.use(httpLoggerMiddleware);

app.use(helmet());

app.use(
  cors({
    origin: env.CORS_ORIGIN,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'X-Request-ID'],
    exposedHeaders: ['X-Request-ID', 'X-RateLimit-Limit', 'X-RateLimit-Remaining'],
    maxAge: 86400,
  }),
);

// 速率限制（测试环境禁用）
if (env.NODE_ENV !== 'test') {
  const limiter = rateLimit({
    windowMs: env.RATE_LIMIT_WINDOW_MS,
    max: env.RATE_LIMIT_MAX,
    standardHeaders: true,
    legacyHeaders: false,
    handler: (_req, res) => {
      res.status(429).json({
        success: false,
        error: '请求过于频繁，请稍后再试',
        code: 'TOO_MANY_REQUESTS',
      });
    },
  });
  app.use('/api/', limiter);
}

app.use(express.json({ limit: '1mb' }));

app.use('/health', healthRoutes);
app.use('/api/bandit', banditRoutes);

app.use(notFoundHandler);
app.use(errorHandler);

export default app;
