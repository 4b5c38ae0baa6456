/**
 * Bandit 臂分配引擎
 */

export * from './constants';
export * from './errors';
export * from './historical-info';
export * from './random';
export * from './strategies/base-strategy';
export * from './strategies/epsilon';
export * from './strategies/epsilon-first';
export * from './strategy-registry';
