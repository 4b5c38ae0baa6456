/**
 * Bandit 数据模型 - 各臂的历史观测
 *
 * 引擎只读取这些数据，不修改也不持久化
 */

import { EmptyHistoryError, InvalidSampledArmError } from './errors';

// ==================== 类型定义 ====================

/**
 * 单个臂的累计观测
 *
 * total 通常 >= win，但不要求等于 win + loss（允许平局等混合语义）
 */
export interface SampledArm {
  /** 胜场数 */
  readonly win: number;
  /** 负场数 */
  readonly loss: number;
  /** 总试验次数 */
  readonly total: number;
}

/** 臂名称 -> 观测 */
export type ArmsSampled = Readonly<Record<string, SampledArm>>;

/**
 * 分配结果：臂名称 -> 概率 [0, 1]
 */
export type AllocationResult = Record<string, number>;

export interface HistoricalInfoOptions {
  /** 构造时校验各臂计数，默认 true */
  validate?: boolean;
}

// ==================== 实现 ====================

/**
 * 历史观测快照
 */
export class HistoricalInfo {
  readonly armsSampled: ArmsSampled;

  constructor(armsSampled: Record<string, SampledArm>, options: HistoricalInfoOptions = {}) {
    const { validate = true } = options;
    const copy: Record<string, SampledArm> = {};

    for (const [armName, arm] of Object.entries(armsSampled)) {
      if (validate) {
        validateSampledArm(armName, arm);
      }
      setArmEntry(copy, armName, Object.freeze({ win: arm.win, loss: arm.loss, total: arm.total }));
    }

    this.armsSampled = Object.freeze(copy);
  }

  /**
   * 从请求体中的 arms_sampled 构建
   */
  static fromJSON(armsSampled: Record<string, SampledArm>): HistoricalInfo {
    return new HistoricalInfo(armsSampled);
  }

  /** 臂数量 */
  get numArms(): number {
    return Object.keys(this.armsSampled).length;
  }

  /** 按插入顺序的臂名称 */
  get armNames(): string[] {
    return Object.keys(this.armsSampled);
  }

  /** 已消耗的样本数（各臂 total 之和） */
  get totalSampled(): number {
    let sum = 0;
    for (const arm of Object.values(this.armsSampled)) {
      sum += arm.total;
    }
    return sum;
  }

  isEmpty(): boolean {
    return this.numArms === 0;
  }

  /**
   * 断言至少有一个臂
   *
   * @throws EmptyHistoryError
   */
  assertNotEmpty(): void {
    if (this.isEmpty()) {
      throw new EmptyHistoryError();
    }
  }

  toJSON(): { arms_sampled: Record<string, SampledArm> } {
    return { arms_sampled: { ...this.armsSampled } };
  }
}

/**
 * 以自有属性写入臂条目
 *
 * 直接赋值 `target['__proto__'] = v` 会改写原型而不是新增键
 */
export function setArmEntry<T>(target: Record<string, T>, armName: string, value: T): void {
  Object.defineProperty(target, armName, {
    value,
    enumerable: true,
    writable: true,
    configurable: true,
  });
}

function validateSampledArm(armName: string, arm: SampledArm): void {
  for (const field of ['win', 'loss', 'total'] as const) {
    const value = arm[field];
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      throw new InvalidSampledArmError(armName, `${field} 必须是有限数值`);
    }
    if (value < 0) {
      throw new InvalidSampledArmError(armName, `${field} 不能为负数 (got ${value})`);
    }
  }
}
