/**
 * 健康检查路由
 */

import { Router, Request, Response } from 'express';

const router = Router();

interface HealthStatus {
  status: 'healthy';
  timestamp: string;
  uptime: number;
}

/**
 * GET /health
 * 存活检查
 */
router.get('/', (_req: Request, res: Response) => {
  const body: HealthStatus = {
    status: 'healthy',
    timestamp: new Date().toISOString(),
    uptime: process.uptime(),
  };
  res.json(body);
});

export default router;
