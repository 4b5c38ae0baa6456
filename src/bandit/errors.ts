/**
 * Bandit 引擎错误类型
 *
 * 引擎只抛出这些错误，由服务层映射为带错误码的 AppError
 */

/**
 * 引擎错误基类
 */
export class BanditError extends Error {
  /** 稳定的错误码，对外暴露 */
  readonly code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = 'BanditError';
    this.code = code;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * 历史数据中没有任何臂
 */
export class EmptyHistoryError extends BanditError {
  constructor(message: string = 'arms_sampled 不能为空') {
    super(message, 'EMPTY_HISTORICAL_INFO');
    this.name = 'EmptyHistoryError';
  }
}

/**
 * 传给 chooseArm 的分配结果不合法（为空、取值越界或总和不为 1）
 * 属于 allocateArms 与 chooseArm 之间的契约违规
 */
export class InvalidAllocationError extends BanditError {
  constructor(message: string) {
    super(message, 'INVALID_ALLOCATION');
    this.name = 'InvalidAllocationError';
  }
}

/**
 * 单个臂的观测计数不合法
 */
export class InvalidSampledArmError extends BanditError {
  readonly armName: string;

  constructor(armName: string, message: string) {
    super(`臂 "${armName}" 数据不合法: ${message}`, 'INVALID_SAMPLED_ARM');
    this.name = 'InvalidSampledArmError';
    this.armName = armName;
  }
}

/**
 * 子类型未注册
 */
export class UnknownSubtypeError extends BanditError {
  readonly subtype: string;

  constructor(subtype: string, supported: readonly string[]) {
    super(
      `未知的 bandit 子类型 "${subtype}"，可选值: ${supported.join(', ')}`,
      'UNKNOWN_SUBTYPE'
    );
    this.name = 'UnknownSubtypeError';
    this.subtype = subtype;
  }
}

/**
 * 超参数校验问题
 */
export interface HyperparameterIssue {
  path: string;
  message: string;
}

/**
 * 超参数不满足子类型的 schema
 */
export class InvalidHyperparameterError extends BanditError {
  readonly issues: HyperparameterIssue[];

  constructor(subtype: string, issues: HyperparameterIssue[]) {
    const first = issues[0];
    const detail = first ? `${first.path || '(root)'}: ${first.message}` : '格式错误';
    super(`子类型 "${subtype}" 的超参数不合法 - ${detail}`, 'INVALID_HYPERPARAMETER');
    this.name = 'InvalidHyperparameterError';
    this.issues = issues;
  }
}
