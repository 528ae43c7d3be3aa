import type { FileFormat } from './grid-types';
import type { TableContext } from './structure-types';

export const RULE_LEVELS = [1, 2, 3] as const;
export type RuleLevel = (typeof RULE_LEVELS)[number];

export type RuleSeverity = 'high' | 'medium' | 'low';

export interface RuleDescriptor {
  id: string;
  description: string;
  severity: RuleSeverity;
  recommendation: string;
  /** Name of the checker capability that evaluates this rule */
  capability: string;
}

export interface CheckVerdict {
  passed: boolean;
  message: string;
}

export interface CheckOutcome {
  id: string;
  description: string;
  severity: RuleSeverity;
  passed: boolean;
  result: 'pass' | 'fail';
  message: string;
}

export interface LevelResult {
  level: RuleLevel;
  passed: number;
  total: number;
  outcomes: readonly CheckOutcome[];
}

export interface AuditReport {
  id: string;
  fileName: string;
  format: FileFormat;
  sheetName: string;
  context: TableContext;
  levels: readonly LevelResult[];
  /** Outcomes of every level, in rule order */
  outcomes: readonly CheckOutcome[];
}
