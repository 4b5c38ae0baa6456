/**
 * StrategyRegistry Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import {
  banditStrategyRegistry,
  defineStrategy,
  epsilonFirstDefinition,
  StrategyRegistry,
} from '../../../src/bandit/strategy-registry';
import { EpsilonFirstStrategy } from '../../../src/bandit/strategies/epsilon-first';
import { HistoricalInfo } from '../../../src/bandit/historical-info';
import { InvalidHyperparameterError, UnknownSubtypeError } from '../../../src/bandit/errors';
import { THREE_ARMS } from '../../fixtures/bandit-fixtures';
import { createSequenceRandomSource } from '../../setup';

describe('StrategyRegistry', () => {
  const info = new HistoricalInfo(THREE_ARMS);

  describe('built-in registry', () => {
    it('should register epsilon_first only', () => {
      expect(banditStrategyRegistry.list()).toEqual(['epsilon_first']);
      expect(banditStrategyRegistry.size()).toBe(1);
      expect(banditStrategyRegistry.has('epsilon_first')).toBe(true);
      expect(banditStrategyRegistry.has('epsilon_greedy')).toBe(false);
    });

    it('should be frozen', () => {
      expect(Object.isFrozen(banditStrategyRegistry)).toBe(true);
    });
  });

  describe('get', () => {
    it('should throw UnknownSubtypeError listing supported subtypes', () => {
      expect(() => banditStrategyRegistry.get('greedy')).toThrow(
        '未知的 bandit 子类型 "greedy"，可选值: epsilon_first'
      );
      expect(() => banditStrategyRegistry.get('greedy')).toThrow(UnknownSubtypeError);
    });

    it('should match subtypes case-sensitively', () => {
      expect(() => banditStrategyRegistry.get('EPSILON_FIRST')).toThrow(UnknownSubtypeError);
    });
  });

  describe('create', () => {
    it('should build an EpsilonFirstStrategy from snake_case hyperparameters', () => {
      const strategy = banditStrategyRegistry.create('epsilon_first', info, {
        epsilon: 0.2,
        total_samples: 300,
      });

      expect(strategy).toBeInstanceOf(EpsilonFirstStrategy);
      if (strategy instanceof EpsilonFirstStrategy) {
        expect(strategy.getEpsilon()).toBe(0.2);
        expect(strategy.getTotalSamples()).toBe(300);
      }
    });

    it('should fill defaults for missing hyperparameters', () => {
      const fromEmpty = banditStrategyRegistry.create('epsilon_first', info, {});
      const fromUndefined = banditStrategyRegistry.create('epsilon_first', info, undefined);

      for (const strategy of [fromEmpty, fromUndefined]) {
        expect(strategy).toBeInstanceOf(EpsilonFirstStrategy);
        if (strategy instanceof EpsilonFirstStrategy) {
          expect(strategy.getEpsilon()).toBe(0.05);
          expect(strategy.getTotalSamples()).toBe(100);
        }
      }
    });

    it('should pass the random source to the strategy', () => {
      const strategy = banditStrategyRegistry.create(
        'epsilon_first',
        info,
        { epsilon: 0.1, total_samples: 1000 },
        { random: createSequenceRandomSource([0.5]) }
      );

      // 探索阶段均匀分配，0.5 落在 arm2 的区间 [1/3, 2/3)
      expect(strategy.chooseArm()).toBe('arm2');
    });

    it('should reject epsilon outside [0, 1]', () => {
      try {
        banditStrategyRegistry.create('epsilon_first', info, { epsilon: 1.5 });
        expect.fail('should have thrown');
      } catch (error) {
        expect(error).toBeInstanceOf(InvalidHyperparameterError);
        if (error instanceof InvalidHyperparameterError) {
          expect(error.code).toBe('INVALID_HYPERPARAMETER');
          expect(error.issues).toEqual([
            { path: 'epsilon', message: 'epsilon 必须在 [0, 1] 范围内' },
          ]);
        }
      }
    });

    it('should reject non-numeric epsilon', () => {
      expect(() =>
        banditStrategyRegistry.create('epsilon_first', info, { epsilon: 'high' })
      ).toThrow('子类型 "epsilon_first" 的超参数不合法 - epsilon: epsilon 必须是数值');
    });

    it('should reject non-positive total_samples', () => {
      expect(() =>
        banditStrategyRegistry.create('epsilon_first', info, { total_samples: 0 })
      ).toThrow(InvalidHyperparameterError);
    });

    it('should check the subtype before the hyperparameters', () => {
      expect(() => banditStrategyRegistry.create('greedy', info, { epsilon: 5 })).toThrow(
        UnknownSubtypeError
      );
    });
  });

  describe('custom registries', () => {
    const fixedDefinition = defineStrategy({
      subtype: 'fixed',
      description: 'test strategy',
      hyperparameterSchema: z.object({ arm: z.string() }),
      create: (historicalInfo, hyperparameters, options) => {
        const strategy = new EpsilonFirstStrategy(historicalInfo, { ...options, epsilon: 0 });
        return {
          getSubtype: () => 'fixed',
          allocateArms: () => ({ [hyperparameters.arm]: 1 }),
          chooseArm: (allocation) => strategy.chooseArm(allocation),
        };
      },
    });

    it('should reject duplicate subtypes', () => {
      expect(() => new StrategyRegistry([epsilonFirstDefinition, epsilonFirstDefinition])).toThrow(
        'Strategy subtype "epsilon_first" is already registered'
      );
    });

    it('should dispatch to the registered definition', () => {
      const registry = new StrategyRegistry([epsilonFirstDefinition, fixedDefinition]);
      const strategy = registry.create('fixed', info, { arm: 'arm3' });

      expect(registry.list()).toEqual(['epsilon_first', 'fixed']);
      expect(strategy.allocateArms()).toEqual({ arm3: 1 });
    });

    it('should report the issue path as (root) when the payload is not an object', () => {
      const registry = new StrategyRegistry([fixedDefinition]);

      expect(() => registry.create('fixed', info, 'not-an-object')).toThrow(
        '子类型 "fixed" 的超参数不合法 - (root): Expected object, received string'
      );
    });
  });
});
