/**
 * Bandit 测试数据
 */

import { SampledArm } from '../../src/bandit/historical-info';

/** 三臂示例：arm1 收益 0.6，arm2 收益 1/3，arm3 未采样 */
export const THREE_ARMS: Record<string, SampledArm> = {
  arm1: { win: 20, loss: 5, total: 25 },
  arm2: { win: 20, loss: 10, total: 30 },
  arm3: { win: 0, loss: 0, total: 0 },
};

/** 两臂收益并列 (0.5)，外加一个未采样臂 */
export const TIED_ARMS: Record<string, SampledArm> = {
  arm1: { win: 10, loss: 0, total: 20 },
  arm2: { win: 10, loss: 0, total: 20 },
  arm3: { win: 0, loss: 0, total: 0 },
};

/** 全部未采样 */
export const UNSAMPLED_ARMS: Record<string, SampledArm> = {
  arm1: { win: 0, loss: 0, total: 0 },
  arm2: { win: 0, loss: 0, total: 0 },
  arm3: { win: 0, loss: 0, total: 0 },
};

/** 全部为负收益 */
export const NEGATIVE_ARMS: Record<string, SampledArm> = {
  arm1: { win: 1, loss: 9, total: 10 },
  arm2: { win: 2, loss: 4, total: 10 },
  arm3: { win: 0, loss: 10, total: 10 },
};
