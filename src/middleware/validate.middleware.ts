import { Request, Response, NextFunction } from 'express';
import { ZodError, ZodTypeAny } from 'zod';

// 扩展 Express Request 类型
declare global {
  namespace Express {
    interface Request {
      validatedBody?: unknown;
    }
  }
}

/**
 * 验证请求体的中间件
 * 校验通过后的数据存放在 req.validatedBody，由路由按 schema 类型读取
 */
export function validateBody(schema: ZodTypeAny) {
  return (req: Request, res: Response, next: NextFunction) => {
    try {
      req.validatedBody = schema.parse(req.body);
      next();
    } catch (error) {
      if (error instanceof ZodError) {
        return res.status(400).json({
          success: false,
          error: error.errors[0]?.message || '请求参数不合法',
          code: 'VALIDATION_ERROR',
          details: error.errors.map((e) => ({
            path: e.path.join('.'),
            message: e.message,
          })),
        });
      }
      next(error);
    }
  };
}
