/**
 * Bandit Strategy Registry
 * 策略查找表
 *
 * 子类型标签 -> (超参数 schema, 策略工厂)。
 * 在进程启动时一次性构建并冻结，运行期不可注册或注销。
 */

import { z } from 'zod';
import { EPSILON_SUBTYPE_FIRST } from './constants';
import { InvalidHyperparameterError, UnknownSubtypeError } from './errors';
import { HistoricalInfo } from './historical-info';
import { BanditStrategy, BanditStrategyOptions } from './strategies/base-strategy';
import { EpsilonFirstStrategy } from './strategies/epsilon-first';
import {
  epsilonFirstHyperparameterSchema,
  EpsilonFirstHyperparameters,
} from '../validators/bandit.validator';

// ==================== 类型定义 ====================

/**
 * 单个子类型的定义
 *
 * @typeParam Params - 超参数校验后的类型
 */
export interface StrategyDefinition<Params> {
  subtype: string;
  description: string;
  hyperparameterSchema: z.ZodType<Params, z.ZodTypeDef, unknown>;
  create(
    historicalInfo: HistoricalInfo,
    hyperparameters: Params,
    options: BanditStrategyOptions
  ): BanditStrategy;
}

/**
 * 注册表条目（已擦除超参数类型）
 */
export interface StrategyRegistryEntry {
  readonly subtype: string;
  readonly description: string;
  build(
    historicalInfo: HistoricalInfo,
    rawHyperparameters: unknown,
    options: BanditStrategyOptions
  ): BanditStrategy;
}

/**
 * 把强类型定义包装成注册表条目，超参数在 build 时校验
 */
export function defineStrategy<Params>(definition: StrategyDefinition<Params>): StrategyRegistryEntry {
  return Object.freeze({
    subtype: definition.subtype,
    description: definition.description,
    build(historicalInfo: HistoricalInfo, rawHyperparameters: unknown, options: BanditStrategyOptions) {
      const parsed = definition.hyperparameterSchema.safeParse(rawHyperparameters ?? {});
      if (!parsed.success) {
        throw new InvalidHyperparameterError(
          definition.subtype,
          parsed.error.errors.map((issue) => ({
            path: issue.path.join('.'),
            message: issue.message,
          }))
        );
      }
      return definition.create(historicalInfo, parsed.data, options);
    },
  });
}

// ==================== 实现 ====================

export class StrategyRegistry {
  private readonly entries: ReadonlyMap<string, StrategyRegistryEntry>;

  /**
   * @throws 如果条目中子类型重复
   */
  constructor(entries: readonly StrategyRegistryEntry[]) {
    const map = new Map<string, StrategyRegistryEntry>();
    for (const entry of entries) {
      if (map.has(entry.subtype)) {
        throw new Error(`Strategy subtype "${entry.subtype}" is already registered`);
      }
      map.set(entry.subtype, entry);
    }
    this.entries = map;
    Object.freeze(this);
  }

  has(subtype: string): boolean {
    return this.entries.has(subtype);
  }

  /**
   * @throws UnknownSubtypeError
   */
  get(subtype: string): StrategyRegistryEntry {
    const entry = this.entries.get(subtype);
    if (!entry) {
      throw new UnknownSubtypeError(subtype, this.list());
    }
    return entry;
  }

  list(): string[] {
    return Array.from(this.entries.keys());
  }

  size(): number {
    return this.entries.size;
  }

  /**
   * 校验超参数并创建策略实例
   *
   * @throws UnknownSubtypeError 子类型未注册
   * @throws InvalidHyperparameterError 超参数不合法
   */
  create(
    subtype: string,
    historicalInfo: HistoricalInfo,
    rawHyperparameters: unknown,
    options: BanditStrategyOptions = {}
  ): BanditStrategy {
    return this.get(subtype).build(historicalInfo, rawHyperparameters, options);
  }
}

/**
 * 内置策略
 */
export const epsilonFirstDefinition = defineStrategy<EpsilonFirstHyperparameters>({
  subtype: EPSILON_SUBTYPE_FIRST,
  description: '先探索 ε·T 次，再把全部概率分给平均收益最高的臂',
  hyperparameterSchema: epsilonFirstHyperparameterSchema,
  create: (historicalInfo, hyperparameters, options) =>
    new EpsilonFirstStrategy(historicalInfo, { ...options, ...hyperparameters }),
});

/**
 * 全局策略查找表
 */
export const banditStrategyRegistry = new StrategyRegistry([epsilonFirstDefinition]);
