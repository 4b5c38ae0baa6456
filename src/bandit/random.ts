/**
 * 随机源
 *
 * chooseArm 的唯一不确定性来源，以参数形式注入，测试可传入固定种子
 */

import seedrandom from 'seedrandom';

/**
 * 返回 [0, 1) 区间均匀分布随机数的函数
 */
export type RandomSource = () => number;

/** 默认随机源 */
export const defaultRandomSource: RandomSource = () => Math.random();

/**
 * 创建可复现的随机源
 *
 * @param seed - 种子字符串，相同种子产生相同序列
 */
export function createSeededRandomSource(seed: string): RandomSource {
  const rng = seedrandom(seed);
  return () => rng();
}
