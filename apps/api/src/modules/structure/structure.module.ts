import { Module } from '@nestjs/common';
import { TableContextBuilder } from './table-context.builder';

@Module({
  providers: [TableContextBuilder],
  exports: [TableContextBuilder],
})
export class StructureModule {}
