import { BadRequestException, Controller, Get, Param, ParseIntPipe, Post, Query, Req } from '@nestjs/common';
import { ApiConsumes, ApiOperation, ApiParam, ApiQuery, ApiResponse, ApiTags } from '@nestjs/swagger';
import type { FastifyRequest } from 'fastify';
import { RULE_LEVELS, auditHintsSchema, type AuditHints } from '@tabaudit/shared';
import { ZodValidationPipe } from '../../common/pipes/zod-validation.pipe';
import { AuditConfigurationError } from '../../common/errors/audit-errors';
import { RuleSetService } from '../checker/rule-set.service';
import { AuditService } from './audit.service';

@ApiTags('audits')
@Controller('api/audits')
export class AuditController {
  constructor(private readonly auditService: AuditService) {}

  @Post()
  @ApiConsumes('multipart/form-data')
  @ApiOperation({
    summary: 'Audit a tabular file',
    description: 'Uploads a .csv, .xls or .xlsx file and runs the Level 1-3 machine-readability checks.',
  })
  @ApiQuery({ name: 'sheetName', required: false, description: 'Sheet to audit' })
  @ApiQuery({ name: 'headerStartRow', required: false, description: 'First header row (1-based)' })
  @ApiQuery({ name: 'headerEndRow', required: false, description: 'Last header row (1-based)' })
  @ApiResponse({ status: 201, description: 'Audit report' })
  @ApiResponse({ status: 400, description: 'Unsupported file, bad hints or unknown sheet' })
  @ApiResponse({ status: 422, description: 'File could not be read' })
  async audit(
    @Req() request: FastifyRequest,
    @Query(new ZodValidationPipe(auditHintsSchema)) hints: AuditHints,
  ) {
    const file = await request.file();
    if (!file) {
      throw new BadRequestException('No file provided');
    }
    const buffer = await file.toBuffer();
    return this.auditService.auditUpload(buffer, file.filename, hints);
  }
}

@ApiTags('rules')
@Controller('api/rules')
export class RulesController {
  constructor(private readonly ruleSets: RuleSetService) {}

  @Get(':level')
  @ApiOperation({ summary: 'List the rules of a level' })
  @ApiParam({ name: 'level', description: 'Rule level (1, 2 or 3)' })
  @ApiResponse({ status: 200, description: 'Ordered rule descriptors' })
  async list(@Param('level', ParseIntPipe) level: number) {
    const known = RULE_LEVELS.find((l) => l === level);
    if (known === undefined) {
      throw new AuditConfigurationError(`Unknown rule level ${level}`);
    }
    return this.ruleSets.load(known);
  }
}
