import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { validateEnv } from './config/env.config';
import { AIModule } from './modules/ai/ai.module';
import { WorkbookModule } from './modules/workbook/workbook.module';
import { StructureModule } from './modules/structure/structure.module';
import { CheckerModule } from './modules/checker/checker.module';
import { AuditModule } from './modules/audit/audit.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, validate: validateEnv }),
    AIModule,
    WorkbookModule,
    StructureModule,
    CheckerModule,
    AuditModule,
  ],
})
export class AppModule { }
