import { Module } from '@nestjs/common';
import { TempFileService } from '../../common/services/temp-file.service';
import { AIModule } from '../ai/ai.module';
import { CheckerModule } from '../checker/checker.module';
import { StructureModule } from '../structure/structure.module';
import { WorkbookModule } from '../workbook/workbook.module';
import { AuditController, RulesController } from './audit.controller';
import { AuditService } from './audit.service';

@Module({
  imports: [AIModule, WorkbookModule, StructureModule, CheckerModule],
  controllers: [AuditController, RulesController],
  providers: [AuditService, TempFileService],
})
export class AuditModule {}
