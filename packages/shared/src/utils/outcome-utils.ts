import type { CheckOutcome, CheckVerdict, LevelResult, RuleDescriptor, RuleLevel } from '../types';

export function toOutcome(rule: RuleDescriptor, verdict: CheckVerdict): CheckOutcome {
  return Object.freeze({
    id: rule.id,
    description: rule.description,
    severity: rule.severity,
    passed: verdict.passed,
    result: verdict.passed ? 'pass' : 'fail',
    message: verdict.message,
  });
}

export function summarizeLevel(level: RuleLevel, outcomes: readonly CheckOutcome[]): LevelResult {
  return {
    level,
    passed: outcomes.filter((o) => o.passed).length,
    total: outcomes.length,
    outcomes,
  };
}

/** Concatenate level outcomes in level order */
export function flattenOutcomes(levels: readonly LevelResult[]): CheckOutcome[] {
  return [...levels]
    .sort((a, b) => a.level - b.level)
    .flatMap((l) => l.outcomes);
}
