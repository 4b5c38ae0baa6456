/**
 * Bandit Strategy Layer - Base Strategy Interface
 * 统一 bandit 策略接口定义
 *
 * 所有策略（epsilon-first 以及同族变体）都实现此接口，
 * 通过子类型标签在注册表中查找
 */

import { ALLOCATION_SUM_TOLERANCE } from '../constants';
import { InvalidAllocationError } from '../errors';
import { AllocationResult, HistoricalInfo } from '../historical-info';
import { defaultRandomSource, RandomSource } from '../random';

/**
 * 策略通用构造选项
 */
export interface BanditStrategyOptions {
  /** chooseArm 使用的随机源，默认 Math.random */
  random?: RandomSource;
}

/**
 * 统一 bandit 策略接口
 */
export interface BanditStrategy {
  /**
   * 获取策略子类型标签
   */
  getSubtype(): string;

  /**
   * 计算每个臂的分配概率
   *
   * @returns 覆盖全部臂、总和为 1 的分配结果
   */
  allocateArms(): AllocationResult;

  /**
   * 按分配概率抽取一个臂
   *
   * @param allocation - 分配结果，缺省时调用 allocateArms()
   * @returns 选中的臂名称
   */
  chooseArm(allocation?: AllocationResult): string;
}

/**
 * 抽象基类，提供共享的选臂逻辑
 */
export abstract class AbstractBanditStrategy implements BanditStrategy {
  protected readonly historicalInfo: HistoricalInfo;
  protected readonly random: RandomSource;
  private readonly subtype: string;

  protected constructor(
    historicalInfo: HistoricalInfo,
    subtype: string,
    options: BanditStrategyOptions = {}
  ) {
    this.historicalInfo = historicalInfo;
    this.subtype = subtype;
    this.random = options.random ?? defaultRandomSource;
  }

  getSubtype(): string {
    return this.subtype;
  }

  abstract allocateArms(): AllocationResult;

  /**
   * 加权随机选臂
   *
   * 臂名按字典序排列后构造 [0, 1) 上的累积概率区间，
   * 随机数落在哪个区间就选哪个臂。分配为 0 的臂永远不会被选中。
   *
   * @throws InvalidAllocationError 分配为空、取值越界或总和不为 1
   */
  chooseArm(allocation: AllocationResult = this.allocateArms()): string {
    const armNames = Object.keys(allocation).sort(compareArmNames);
    if (armNames.length === 0) {
      throw new InvalidAllocationError('分配结果为空，无法选臂');
    }

    let sum = 0;
    for (const armName of armNames) {
      const value = allocation[armName];
      if (!Number.isFinite(value) || value < 0 || value > 1) {
        throw new InvalidAllocationError(`臂 "${armName}" 的分配值不合法: ${value}`);
      }
      sum += value;
    }
    if (Math.abs(sum - 1) > ALLOCATION_SUM_TOLERANCE) {
      throw new InvalidAllocationError(`分配概率之和必须为 1 (got ${sum})`);
    }

    const draw = this.random();
    let cumulative = 0;
    let lastPositive: string | null = null;

    for (const armName of armNames) {
      const value = allocation[armName];
      if (value <= 0) {
        continue;
      }
      cumulative += value;
      lastPositive = armName;
      if (draw < cumulative) {
        return armName;
      }
    }

    // 累积值因浮点误差略小于 1 时落到最后一个非零臂
    if (lastPositive === null) {
      throw new InvalidAllocationError('没有分配概率大于 0 的臂');
    }
    return lastPositive;
  }
}

/**
 * 找出取值最大的臂（分配值或平均收益），按严格相等判断并列
 *
 * @throws InvalidAllocationError 输入为空
 */
export function getWinningArmNames(values: Readonly<Record<string, number>>): Set<string> {
  const entries = Object.entries(values);
  if (entries.length === 0) {
    throw new InvalidAllocationError('分配结果为空');
  }

  let best = -Infinity;
  for (const [, value] of entries) {
    if (value > best) {
      best = value;
    }
  }
  return new Set(entries.filter(([, value]) => value === best).map(([armName]) => armName));
}

function compareArmNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
