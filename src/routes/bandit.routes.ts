/**
 * Bandit 路由
 * 多臂老虎机臂分配 API
 */

import { Router } from 'express';
import { banditService } from '../services/bandit.service';
import { validateBody } from '../middleware/validate.middleware';
import {
  banditEpsilonRequestSchema,
  BanditEpsilonRequestDto,
} from '../validators/bandit.validator';
import { BANDIT_EPSILON_ENDPOINT } from '../bandit/constants';

const router = Router();

/**
 * POST /api/bandit/epsilon
 * 根据历史数据计算各臂分配概率并选出下一个要拉的臂
 */
router.post('/epsilon', validateBody(banditEpsilonRequestSchema), (req, res, next) => {
  try {
    const validatedData = req.validatedBody as BanditEpsilonRequestDto;
    const result = banditService.allocate(validatedData);

    res.json({
      success: true,
      data: result,
    });
  } catch (error) {
    next(error);
  }
});

/**
 * GET /api/bandit/epsilon/pretty
 * 返回可直接提交的示例请求，便于在浏览器中调试
 */
router.get('/epsilon/pretty', (_req, res) => {
  res.json({
    success: true,
    data: {
      endpoint: BANDIT_EPSILON_ENDPOINT,
      subtypes: banditService.getSupportedSubtypes(),
      defaultRequest: banditService.getPrettyDefaultRequest(),
    },
  });
});

export default router;
