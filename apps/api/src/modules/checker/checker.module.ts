import { Module } from '@nestjs/common';
import { AIModule } from '../ai/ai.module';
import { CheckerFactory } from './checker.factory';
import { CheckRouterService } from './check-router.service';
import { RuleSetService } from './rule-set.service';
import { CsvFormatHandler } from './handlers/csv-format.handler';
import { XlsFormatHandler } from './handlers/xls-format.handler';
import { XlsxFormatHandler } from './handlers/xlsx-format.handler';

@Module({
  imports: [AIModule],
  providers: [CsvFormatHandler, XlsFormatHandler, XlsxFormatHandler, CheckerFactory, CheckRouterService, RuleSetService],
  exports: [CheckerFactory, CheckRouterService, RuleSetService],
})
export class CheckerModule {}
