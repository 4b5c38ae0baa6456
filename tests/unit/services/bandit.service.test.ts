/**
 * BanditService Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { BanditService, toAppError } from '../../../src/services/bandit.service';
import { AppError } from '../../../src/middleware/error.middleware';
import {
  BanditError,
  EmptyHistoryError,
  InvalidAllocationError,
  InvalidHyperparameterError,
  InvalidSampledArmError,
  UnknownSubtypeError,
} from '../../../src/bandit/errors';
import { defineStrategy, StrategyRegistry } from '../../../src/bandit/strategy-registry';
import {
  banditEpsilonRequestSchema,
  BanditEpsilonRequestDto,
} from '../../../src/validators/bandit.validator';
import { THREE_ARMS } from '../../fixtures/bandit-fixtures';
import { createSequenceRandomSource } from '../../setup';
import { z } from 'zod';

function buildRequest(overrides: Partial<BanditEpsilonRequestDto> = {}): BanditEpsilonRequestDto {
  return {
    subtype: 'epsilon_first',
    historical_info: { arms_sampled: THREE_ARMS },
    hyperparameter_info: {},
    ...overrides,
  };
}

function captureAppError(fn: () => unknown): AppError {
  try {
    fn();
  } catch (error) {
    if (error instanceof AppError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected AppError to be thrown');
}

describe('BanditService', () => {
  describe('allocate', () => {
    it('should return endpoint, arms and winner', () => {
      const service = new BanditService({ random: createSequenceRandomSource([0.3]) });

      const result = service.allocate(
        buildRequest({ hyperparameter_info: { epsilon: 0.1, total_samples: 50 } })
      );

      expect(result).toEqual({
        endpoint: 'bandit_epsilon',
        arms: { arm1: 1, arm2: 0, arm3: 0 },
        winner: 'arm1',
      });
    });

    it('should choose the winner with the injected random source during exploration', () => {
      const service = new BanditService({ random: createSequenceRandomSource([0.5, 0.9, 0.1]) });
      const request = buildRequest({ hyperparameter_info: { epsilon: 0.1, total_samples: 1000 } });

      expect(service.allocate(request).winner).toBe('arm2');
      expect(service.allocate(request).winner).toBe('arm3');
      expect(service.allocate(request).winner).toBe('arm1');
    });

    it('should use default hyperparameters', () => {
      const service = new BanditService({ random: createSequenceRandomSource([0]) });

      expect(service.allocate(buildRequest()).arms).toEqual({ arm1: 1, arm2: 0, arm3: 0 });
    });

    it('should accept the output of the request schema', () => {
      const service = new BanditService({ random: createSequenceRandomSource([0]) });
      const request = banditEpsilonRequestSchema.parse({
        historical_info: { arms_sampled: { only: { win: 3, loss: 1, total: 4 } } },
      });

      expect(service.allocate(request)).toEqual({
        endpoint: 'bandit_epsilon',
        arms: { only: 1 },
        winner: 'only',
      });
    });

    it('should map an empty history to EMPTY_HISTORICAL_INFO', () => {
      const service = new BanditService();
      const error = captureAppError(() =>
        service.allocate(buildRequest({ historical_info: { arms_sampled: {} } }))
      );

      expect(error.statusCode).toBe(400);
      expect(error.code).toBe('EMPTY_HISTORICAL_INFO');
      expect(error.message).toBe('arms_sampled 不能为空');
    });

    it('should map an unknown subtype to UNKNOWN_SUBTYPE', () => {
      const service = new BanditService();
      const error = captureAppError(() => service.allocate(buildRequest({ subtype: 'greedy' })));

      expect(error.statusCode).toBe(400);
      expect(error.code).toBe('UNKNOWN_SUBTYPE');
    });

    it('should map invalid hyperparameters to INVALID_HYPERPARAMETER', () => {
      const service = new BanditService();
      const error = captureAppError(() =>
        service.allocate(buildRequest({ hyperparameter_info: { epsilon: 2 } }))
      );

      expect(error.statusCode).toBe(400);
      expect(error.code).toBe('INVALID_HYPERPARAMETER');
      expect(error.message).toBe(
        '子类型 "epsilon_first" 的超参数不合法 - epsilon: epsilon 必须在 [0, 1] 范围内'
      );
    });

    it('should map a broken allocation to a non-operational 500', () => {
      const brokenRegistry = new StrategyRegistry([
        defineStrategy({
          subtype: 'broken',
          description: 'returns an allocation that does not sum to 1',
          hyperparameterSchema: z.object({}),
          create: () => ({
            getSubtype: () => 'broken',
            allocateArms: () => ({ arm1: 0.2 }),
            chooseArm: () => {
              throw new InvalidAllocationError('分配概率之和必须为 1 (got 0.2)');
            },
          }),
        }),
      ]);
      const service = new BanditService({ registry: brokenRegistry });
      const error = captureAppError(() => service.allocate(buildRequest({ subtype: 'broken' })));

      expect(error.statusCode).toBe(500);
      expect(error.code).toBe('INVALID_ALLOCATION');
      expect(error.isOperational).toBe(false);
    });

    it('should rethrow errors that are not bandit errors', () => {
      const failingRegistry = new StrategyRegistry([
        defineStrategy({
          subtype: 'failing',
          description: 'throws a plain error',
          hyperparameterSchema: z.object({}),
          create: () => {
            throw new Error('boom');
          },
        }),
      ]);
      const service = new BanditService({ registry: failingRegistry });

      expect(() => service.allocate(buildRequest({ subtype: 'failing' }))).toThrow('boom');
      expect(() => service.allocate(buildRequest({ subtype: 'failing' }))).not.toThrow(AppError);
    });
  });

  describe('getSupportedSubtypes', () => {
    it('should list the registry subtypes', () => {
      expect(new BanditService().getSupportedSubtypes()).toEqual(['epsilon_first']);
    });
  });

  describe('getPrettyDefaultRequest', () => {
    it('should be a valid request', () => {
      const request = new BanditService().getPrettyDefaultRequest();

      expect(banditEpsilonRequestSchema.safeParse(request).success).toBe(true);
      expect(request.hyperparameter_info).toEqual({ epsilon: 0.05, total_samples: 100 });
    });
  });
});

describe('toAppError', () => {
  it.each<[string, BanditError, number, string]>([
    ['EmptyHistoryError', new EmptyHistoryError(), 400, 'EMPTY_HISTORICAL_INFO'],
    ['UnknownSubtypeError', new UnknownSubtypeError('x', ['epsilon_first']), 400, 'UNKNOWN_SUBTYPE'],
    [
      'InvalidHyperparameterError',
      new InvalidHyperparameterError('epsilon_first', []),
      400,
      'INVALID_HYPERPARAMETER',
    ],
    ['InvalidSampledArmError', new InvalidSampledArmError('arm1', 'bad'), 400, 'INVALID_SAMPLED_ARM'],
    ['InvalidAllocationError', new InvalidAllocationError('bad'), 500, 'INVALID_ALLOCATION'],
    ['BanditError', new BanditError('unexpected', 'SOMETHING_ELSE'), 500, 'SOMETHING_ELSE'],
  ])('should map %s', (_name, error, statusCode, code) => {
    const appError = toAppError(error);

    expect(appError).toBeInstanceOf(AppError);
    expect(appError.statusCode).toBe(statusCode);
    expect(appError.code).toBe(code);
    expect(appError.message).toBe(error.message);
  });
});
