/**
 * Bandit 服务
 *
 * 请求边界与分配引擎之间的一层：
 * 构建历史数据 → 按子类型创建策略 → 计算分配 → 选臂，
 * 并把引擎错误映射为带独立错误码的 AppError
 */

import {
  AllocationResult,
  BANDIT_EPSILON_ENDPOINT,
  BanditError,
  banditStrategyRegistry,
  createSeededRandomSource,
  DEFAULT_EPSILON,
  DEFAULT_EPSILON_SUBTYPE,
  DEFAULT_TOTAL_SAMPLES,
  defaultRandomSource,
  EmptyHistoryError,
  HistoricalInfo,
  InvalidAllocationError,
  InvalidHyperparameterError,
  InvalidSampledArmError,
  RandomSource,
  StrategyRegistry,
  UnknownSubtypeError,
} from '../bandit';
import { env } from '../config/env';
import { serviceLogger } from '../logger';
import { AppError } from '../middleware/error.middleware';
import { BanditEpsilonRequestDto } from '../validators/bandit.validator';

// ==================== 类型定义 ====================

export interface BanditAllocationResponse {
  endpoint: string;
  arms: AllocationResult;
  winner: string;
}

export interface BanditServiceOptions {
  registry?: StrategyRegistry;
  random?: RandomSource;
}

// ==================== 实现 ====================

export class BanditService {
  private readonly registry: StrategyRegistry;
  private readonly random: RandomSource;

  constructor(options: BanditServiceOptions = {}) {
    this.registry = options.registry ?? banditStrategyRegistry;
    this.random = options.random ?? defaultRandomSource;
  }

  /**
   * 计算分配并选出胜出臂
   *
   * @throws AppError 错误码见 toAppError
   */
  allocate(request: BanditEpsilonRequestDto): BanditAllocationResponse {
    try {
      const historicalInfo = HistoricalInfo.fromJSON(request.historical_info.arms_sampled);
      const strategy = this.registry.create(
        request.subtype,
        historicalInfo,
        request.hyperparameter_info,
        { random: this.random }
      );

      const arms = strategy.allocateArms();
      const winner = strategy.chooseArm(arms);

      serviceLogger.info(
        { subtype: request.subtype, numArms: historicalInfo.numArms, winner },
        'Bandit 分配完成'
      );

      return { endpoint: BANDIT_EPSILON_ENDPOINT, arms, winner };
    } catch (error) {
      if (error instanceof BanditError) {
        throw toAppError(error);
      }
      throw error;
    }
  }

  /** 已支持的子类型 */
  getSupportedSubtypes(): string[] {
    return this.registry.list();
  }

  /**
   * pretty 页面展示的默认请求
   */
  getPrettyDefaultRequest() {
    return {
      subtype: DEFAULT_EPSILON_SUBTYPE,
      historical_info: {
        arms_sampled: {
          arm1: { win: 20, loss: 5, total: 25 },
          arm2: { win: 20, loss: 10, total: 30 },
          arm3: { win: 0, loss: 0, total: 0 },
        },
      },
      hyperparameter_info: {
        epsilon: DEFAULT_EPSILON,
        total_samples: DEFAULT_TOTAL_SAMPLES,
      },
    };
  }
}

/**
 * 引擎错误 → 对外错误
 *
 * InvalidAllocationError 属于内部契约违规，对外只返回通用 500
 */
export function toAppError(error: BanditError): AppError {
  if (error instanceof InvalidAllocationError) {
    return AppError.internal(error.message, error.code);
  }
  if (
    error instanceof EmptyHistoryError ||
    error instanceof UnknownSubtypeError ||
    error instanceof InvalidHyperparameterError ||
    error instanceof InvalidSampledArmError
  ) {
    return AppError.badRequest(error.message, error.code);
  }
  return AppError.internal(error.message, error.code);
}

/**
 * 共享实例；配置了 BANDIT_RANDOM_SEED 时使用固定种子
 */
export const banditService = new BanditService({
  random: env.BANDIT_RANDOM_SEED
    ? createSeededRandomSource(env.BANDIT_RANDOM_SEED)
    : defaultRandomSource,
});

export default banditService;
