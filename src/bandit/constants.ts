/**
 * Bandit 常量
 */

/** 默认探索比例 ε */
export const DEFAULT_EPSILON = 0.05;

/** 默认实验总样本预算 T */
export const DEFAULT_TOTAL_SAMPLES = 100;

/** epsilon-first 子类型标签 */
export const EPSILON_SUBTYPE_FIRST = 'epsilon_first';

/** epsilon 端点的默认子类型 */
export const DEFAULT_EPSILON_SUBTYPE = EPSILON_SUBTYPE_FIRST;

/** epsilon 端点名称（响应体 endpoint 字段） */
export const BANDIT_EPSILON_ENDPOINT = 'bandit_epsilon';

/** 分配概率之和允许的浮点误差 */
export const ALLOCATION_SUM_TOLERANCE = 1e-9;
