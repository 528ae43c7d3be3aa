import { Injectable, Logger } from '@nestjs/common';
import { OpenAIClientService } from './openai-client.service';

/** Closed-question oracle used by the semantic checks */
export interface JudgmentOracle {
  /** Resolves true for YES, false for NO */
  judge(question: string): Promise<boolean>;
}

export const JUDGMENT_ORACLE = Symbol('JUDGMENT_ORACLE');

export class OracleAnswerError extends Error {
  constructor(answer: string) {
    super(`Oracle gave no YES/NO answer: "${answer.slice(0, 80)}"`);
    this.name = 'OracleAnswerError';
  }
}

const SYSTEM_PROMPT =
  'You review tabular data files for machine readability. ' +
  'Answer the question with a single word: YES or NO.';

export function parseYesNo(answer: string): boolean {
  const match = answer.match(/\b(YES|NO)\b/i);
  if (!match?.[1]) throw new OracleAnswerError(answer);
  return match[1].toUpperCase() === 'YES';
}

@Injectable()
export class LlmJudgmentOracle implements JudgmentOracle {
  private readonly logger = new Logger(LlmJudgmentOracle.name);

  constructor(private readonly client: OpenAIClientService) {}

  async judge(question: string): Promise<boolean> {
    const response = await this.client.chat({
      systemPrompt: SYSTEM_PROMPT,
      userMessage: question,
      maxTokens: 5,
    });
    const verdict = parseYesNo(response.content);
    this.logger.debug(`judge → ${verdict ? 'YES' : 'NO'}`);
    return verdict;
  }
}
