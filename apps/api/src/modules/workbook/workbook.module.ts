import { Module } from '@nestjs/common';
import { WorkbookLoaderService } from './workbook-loader.service';

@Module({
  providers: [WorkbookLoaderService],
  exports: [WorkbookLoaderService],
})
export class WorkbookModule {}
