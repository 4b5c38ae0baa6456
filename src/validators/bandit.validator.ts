/**
 * Bandit 路由输入验证器
 * 使用 Zod 进行类型安全的输入校验
 */

import { z } from 'zod';
import {
  DEFAULT_EPSILON,
  DEFAULT_EPSILON_SUBTYPE,
  DEFAULT_TOTAL_SAMPLES,
} from '../bandit/constants';

/**
 * 单个臂的观测计数
 */
export const sampledArmSchema = z.object({
  win: z.number({ invalid_type_error: 'win 必须是数值' }).finite().min(0, 'win 不能为负数'),
  loss: z.number({ invalid_type_error: 'loss 必须是数值' }).finite().min(0, 'loss 不能为负数'),
  total: z.number({ invalid_type_error: 'total 必须是数值' }).finite().min(0, 'total 不能为负数'),
});

/**
 * 臂名称
 * z.record 会静默丢弃 __proto__ 键，这里显式拒绝
 */
export const armNameSchema = z
  .string()
  .refine((armName) => armName !== '__proto__', '臂名称不能为 __proto__');

/**
 * 历史数据
 * 空的 arms_sampled 在此放行，由引擎抛出 EmptyHistoryError 以返回专门的错误码
 */
export const historicalInfoSchema = z.object({
  arms_sampled: z.record(armNameSchema, sampledArmSchema),
});

/**
 * epsilon 端点请求
 * POST /api/bandit/epsilon
 *
 * subtype 只校验为字符串，未知子类型由注册表给出 UNKNOWN_SUBTYPE
 * hyperparameter_info 的结构取决于 subtype，在分发时再校验
 */
export const banditEpsilonRequestSchema = z.object({
  subtype: z.string().min(1, 'subtype 不能为空').default(DEFAULT_EPSILON_SUBTYPE),
  historical_info: historicalInfoSchema,
  hyperparameter_info: z.record(z.string(), z.unknown()).default({}),
});

/**
 * epsilon-first 超参数
 */
export const epsilonFirstHyperparameterSchema = z
  .object({
    epsilon: z
      .number({ invalid_type_error: 'epsilon 必须是数值' })
      .min(0, 'epsilon 必须在 [0, 1] 范围内')
      .max(1, 'epsilon 必须在 [0, 1] 范围内')
      .default(DEFAULT_EPSILON),
    total_samples: z
      .number({ invalid_type_error: 'total_samples 必须是数值' })
      .finite()
      .positive('total_samples 必须为正数')
      .default(DEFAULT_TOTAL_SAMPLES),
  })
  .transform((val) => ({
    epsilon: val.epsilon,
    totalSamples: val.total_samples,
  }));

export type BanditEpsilonRequestDto = z.infer<typeof banditEpsilonRequestSchema>;
export type EpsilonFirstHyperparameters = z.output<typeof epsilonFirstHyperparameterSchema>;
