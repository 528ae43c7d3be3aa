import { Module } from '@nestjs/common';
import { OpenAIClientService } from './openai-client.service';
import { JUDGMENT_ORACLE, LlmJudgmentOracle } from './judgment-oracle';
import { LlmStructureOracle, STRUCTURE_ORACLE } from './structure-oracle.service';

@Module({
  providers: [
    OpenAIClientService,
    { provide: JUDGMENT_ORACLE, useClass: LlmJudgmentOracle },
    { provide: STRUCTURE_ORACLE, useClass: LlmStructureOracle },
  ],
  exports: [OpenAIClientService, JUDGMENT_ORACLE, STRUCTURE_ORACLE],
})
export class AIModule {}
