import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { ZodError } from 'zod';
import {
  LEVEL_CAPABILITIES,
  RULE_LEVELS,
  deepFreeze,
  ruleSetSchema,
  type RuleDescriptor,
  type RuleLevel,
} from '@tabaudit/shared';
import { AuditConfigurationError, errorMessage } from '../../common/errors/audit-errors';

const DEFAULT_RULES_DIR = path.resolve(__dirname, '..', '..', '..', 'rules');

/**
 * Loads the ordered rule list of each level from `level<N>.json` in the rules directory.
 */
@Injectable()
export class RuleSetService {
  private readonly logger = new Logger(RuleSetService.name);
  private readonly cache = new Map<RuleLevel, readonly RuleDescriptor[]>();
  readonly rulesDir: string;

  constructor(config: ConfigService) {
    this.rulesDir = path.resolve(config.get<string>('RULES_DIR') ?? DEFAULT_RULES_DIR);
  }

  async load(level: RuleLevel): Promise<readonly RuleDescriptor[]> {
    const cached = this.cache.get(level);
    if (cached) return cached;

    const file = path.join(this.rulesDir, `level${level}.json`);
    let raw: string;
    try {
      raw = await readFile(file, 'utf-8');
    } catch (err) {
      throw new AuditConfigurationError(`Rule file for level ${level} is unreadable: ${errorMessage(err)}`);
    }

    let rules: RuleDescriptor[];
    try {
      rules = ruleSetSchema.parse(JSON.parse(raw));
    } catch (err) {
      const detail =
        err instanceof ZodError
          ? err.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join('; ')
          : errorMessage(err);
      throw new AuditConfigurationError(`Rule file ${path.basename(file)} is invalid: ${detail}`);
    }

    const known: readonly string[] = LEVEL_CAPABILITIES[level];
    for (const rule of rules.filter((r) => !known.includes(r.capability))) {
      this.logger.warn(`${rule.id} names unknown capability "${rule.capability}" for level ${level}`);
    }

    const frozen = deepFreeze(rules);
    this.cache.set(level, frozen);
    this.logger.log(`Loaded ${rules.length} level ${level} rules`);
    return frozen;
  }

  async loadAll(): Promise<Map<RuleLevel, readonly RuleDescriptor[]>> {
    const entries = await Promise.all(RULE_LEVELS.map(async (level) => [level, await this.load(level)] as const));
    return new Map(entries);
  }
}
