import type { CostFunction } from './types.js';

export const COST_FUNCTION_NAMES = ['max', 'min', 'sum', 'product'] as const;
export type CostFunctionName = (typeof COST_FUNCTION_NAMES)[number];

export const maxCost: CostFunction = (a, b) => Math.max(a, b);
export const minCost: CostFunction = (a, b) => Math.min(a, b);
export const sumCost: CostFunction = (a, b) => a + b;
export const productCost: CostFunction = (a, b) => a * b;

const COST_FUNCTIONS: Record<CostFunctionName, CostFunction> = {
  max: maxCost,
  min: minCost,
  sum: sumCost,
  product: productCost,
};

export function resolveCostFunction(name: CostFunctionName): CostFunction {
  return COST_FUNCTIONS[name];
}
