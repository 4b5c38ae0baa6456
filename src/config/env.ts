/**
 * 环境变量配置
 *
 * 使用 Zod 进行运行时验证，所有环境变量都通过此文件统一访问
 */

import { config } from 'dotenv';
import { z } from 'zod';
import { startupLogger } from '../logger';

// 加载 .env 文件
config();

/**
 * 环境变量 Schema 定义
 */
export const envSchema = z.object({
  // ============================================
  // 服务器配置
  // ============================================
  PORT: z
    .string()
    .default('3000')
    .transform((val) => parseInt(val, 10))
    .pipe(z.number().int().positive().max(65535, 'PORT 必须在 1-65535 范围内')),

  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // ============================================
  // CORS 配置
  // ============================================
  CORS_ORIGIN: z.string().default('http://localhost:5173'),

  // ============================================
  // 反向代理配置
  // ============================================
  TRUST_PROXY: z
    .string()
    .default('false')
    .transform((val): number | string | false => {
      if (val === 'false' || val === '0') return false;
      if (val === 'true' || val === '1') return 1;
      const num = parseInt(val, 10);
      return isNaN(num) ? val : num;
    }),

  // ============================================
  // 速率限制配置
  // ============================================
  RATE_LIMIT_MAX: z
    .string()
    .default('500')
    .transform((val) => parseInt(val, 10))
    .pipe(z.number().int().positive()),

  RATE_LIMIT_WINDOW_MS: z
    .string()
    .default('900000')
    .transform((val) => parseInt(val, 10))
    .pipe(z.number().int().positive()),

  // ============================================
  // 日志配置
  // ============================================
  LOG_LEVEL: z
    .enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'])
    .default('info'),

  // ============================================
  // Bandit 配置
  // ============================================
  // 设置后 chooseArm 使用固定种子的随机源，便于复现
  BANDIT_RANDOM_SEED: z.string().min(1).optional(),
});

/**
 * 环境变量类型
 */
export type Env = z.infer<typeof envSchema>;

/**
 * 验证并解析环境变量
 */
export function validateEnv(source: NodeJS.ProcessEnv = process.env): Env {
  try {
    const parsed = envSchema.parse({
      PORT: source.PORT,
      NODE_ENV: source.NODE_ENV,
      CORS_ORIGIN: source.CORS_ORIGIN,
      TRUST_PROXY: source.TRUST_PROXY,
      RATE_LIMIT_MAX: source.RATE_LIMIT_MAX,
      RATE_LIMIT_WINDOW_MS: source.RATE_LIMIT_WINDOW_MS,
      LOG_LEVEL: source.LOG_LEVEL,
      BANDIT_RANDOM_SEED: source.BANDIT_RANDOM_SEED,
    });

    if (parsed.NODE_ENV === 'production') {
      if (parsed.CORS_ORIGIN.includes('localhost')) {
        startupLogger.warn('⚠️ 生产环境使用了 localhost CORS 源，这可能是配置错误');
      }
      if (parsed.BANDIT_RANDOM_SEED) {
        startupLogger.warn('⚠️ 生产环境配置了 BANDIT_RANDOM_SEED，选臂结果将可预测');
      }
    }

    startupLogger.info(`环境变量验证成功 (环境: ${parsed.NODE_ENV})`);
    return parsed;
  } catch (error) {
    if (error instanceof z.ZodError) {
      startupLogger.error('环境变量验证失败:');
      error.errors.forEach((err) => {
        startupLogger.error(`  - ${err.path.join('.')}: ${err.message}`);
      });
      throw new Error('环境变量配置错误，请检查 .env 文件');
    }
    throw error;
  }
}

/**
 * 导出验证后的环境变量
 *
 * @example
 * ```ts
 * import { env } from './config/env';
 *
 * startupLogger.info(`Server running on port ${env.PORT}`);
 * ```
 */
export const env = validateEnv();
