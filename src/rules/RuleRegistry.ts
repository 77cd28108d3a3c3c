import { UnknownRuleError } from '../conf/errors';
import { DistinctRule } from './DistinctRule';
import type { Rule } from './Rule';
import { SumRule } from './SumRule';

const FACTORIES: Record<string, () => Rule> = {
  rowSum: () => new SumRule('row'),
  columnSum: () => new SumRule('column'),
  rowDistinct: () => new DistinctRule('row'),
  columnDistinct: () => new DistinctRule('column'),
};

export function createRule(name: string): Rule {
  const factory = Object.hasOwn(FACTORIES, name) ? FACTORIES[name] : undefined;
  if (!factory) throw new UnknownRuleError(name);
  return factory();
}

export function ruleIds(): string[] {
  return Object.keys(FACTORIES);
}
