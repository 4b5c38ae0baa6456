/**
 * Bandit Strategy Layer - Epsilon-First
 * 先探索、后利用的两阶段策略
 *
 * 实验总预算为 T 次试验：
 * - 前 ε·T 次为纯探索，所有臂等概率
 * - 之后为纯利用，概率 1 平分给平均收益最高的臂
 *
 * 已消耗样本数 = 各臂 total 之和。判定使用严格小于，
 * 恰好等于 ε·T 时已进入利用阶段。
 *
 * 示例（ε = 0.1）：
 * | 臂 | win | loss | total | 平均收益 |
 * |----|-----|------|-------|----------|
 * | arm1 | 20 | 5 | 25 | 0.6 |
 * | arm2 | 20 | 10 | 30 | 0.333 |
 * | arm3 | 0 | 0 | 0 | 0 |
 *
 * - T = 50: 已采样 55 >= 5，利用阶段 → arm1: 1, arm2: 0, arm3: 0
 * - T = 1000: 已采样 55 < 100，探索阶段 → 各 1/3
 */

import { DEFAULT_TOTAL_SAMPLES, EPSILON_SUBTYPE_FIRST } from '../constants';
import { AllocationResult, HistoricalInfo, SampledArm, setArmEntry } from '../historical-info';
import { banditLogger } from '../../logger';
import { getWinningArmNames } from './base-strategy';
import { AbstractEpsilonStrategy, EpsilonStrategyOptions } from './epsilon';

// ==================== 类型定义 ====================

export interface EpsilonFirstOptions extends EpsilonStrategyOptions {
  /** 实验总样本预算 T（已采样 + 待采样） */
  totalSamples?: number;
}

/** 所处阶段 */
export type EpsilonFirstPhase = 'exploration' | 'exploitation';

// ==================== 实现 ====================

export class EpsilonFirstStrategy extends AbstractEpsilonStrategy {
  private readonly totalSamples: number;

  constructor(historicalInfo: HistoricalInfo, options: EpsilonFirstOptions = {}) {
    super(historicalInfo, EPSILON_SUBTYPE_FIRST, options);
    this.totalSamples = options.totalSamples ?? DEFAULT_TOTAL_SAMPLES;
  }

  getTotalSamples(): number {
    return this.totalSamples;
  }

  /**
   * 当前所处阶段
   */
  getPhase(): EpsilonFirstPhase {
    return this.historicalInfo.totalSampled < this.totalSamples * this.epsilon
      ? 'exploration'
      : 'exploitation';
  }

  /**
   * 计算各臂分配概率
   *
   * 利用阶段出现并列时，概率 1 在所有最优臂之间平分，其余臂为 0。
   * 并列按计算后的收益值严格相等判断。
   *
   * @throws EmptyHistoryError 没有任何臂
   */
  allocateArms(): AllocationResult {
    this.historicalInfo.assertNotEmpty();

    const { armsSampled, numArms } = this.historicalInfo;
    const phase = this.getPhase();
    const allocation: AllocationResult = {};

    if (phase === 'exploration') {
      const equalAllocation = 1 / numArms;
      for (const armName of Object.keys(armsSampled)) {
        setArmEntry(allocation, armName, equalAllocation);
      }
      this.logDecision(phase, allocation);
      return allocation;
    }

    const payoffs: Record<string, number> = {};
    for (const [armName, arm] of Object.entries(armsSampled)) {
      setArmEntry(payoffs, armName, averagePayoff(arm));
    }

    const winningArmNames = getWinningArmNames(payoffs);
    const winningAllocation = 1 / winningArmNames.size;
    for (const armName of Object.keys(armsSampled)) {
      setArmEntry(allocation, armName, winningArmNames.has(armName) ? winningAllocation : 0);
    }

    const [bestArmName] = winningArmNames;
    this.logDecision(phase, allocation, payoffs[bestArmName]);
    return allocation;
  }

  private logDecision(
    phase: EpsilonFirstPhase,
    allocation: AllocationResult,
    bestPayoff?: number
  ): void {
    banditLogger.debug(
      {
        subtype: this.getSubtype(),
        phase,
        numArms: this.historicalInfo.numArms,
        numSampled: this.historicalInfo.totalSampled,
        threshold: this.totalSamples * this.epsilon,
        bestPayoff,
        allocation,
      },
      'epsilon-first 分配完成'
    );
  }
}

/**
 * 平均收益 (win - loss) / total，未采样的臂记为 0
 */
export function averagePayoff(arm: SampledArm): number {
  return arm.total > 0 ? (arm.win - arm.loss) / arm.total : 0;
}
