/**
 * Epsilon 族策略基类
 *
 * 同族变体（epsilon-first、epsilon-greedy 等）共享探索比例 ε
 */

import { DEFAULT_EPSILON } from '../constants';
import { HistoricalInfo } from '../historical-info';
import { AbstractBanditStrategy, BanditStrategyOptions } from './base-strategy';

export interface EpsilonStrategyOptions extends BanditStrategyOptions {
  /** 探索比例 [0, 1] */
  epsilon?: number;
}

export abstract class AbstractEpsilonStrategy extends AbstractBanditStrategy {
  protected readonly epsilon: number;

  protected constructor(
    historicalInfo: HistoricalInfo,
    subtype: string,
    options: EpsilonStrategyOptions = {}
  ) {
    super(historicalInfo, subtype, options);
    this.epsilon = options.epsilon ?? DEFAULT_EPSILON;
  }

  getEpsilon(): number {
    return this.epsilon;
  }
}
