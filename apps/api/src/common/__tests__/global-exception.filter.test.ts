import { describe, it, expect } from 'vitest';
import { BadRequestException, NotFoundException } from '@nestjs/common';
import { z } from 'zod';
import { describeException, errorResponse } from '../filters/global-exception.filter';
import { AuditConfigurationError, AuditResourceError } from '../errors/audit-errors';

describe('describeException', () => {
  it('maps configuration errors to 400', () => {
    expect(describeException(new AuditConfigurationError('Unknown rule level 7'))).toEqual({
      status: 400,
      code: 'CONFIGURATION_ERROR',
      message: 'Unknown rule level 7',
    });
  });

  it('maps resource errors to 422', () => {
    expect(describeException(new AuditResourceError('Cannot read table.csv'))).toEqual({
      status: 422,
      code: 'RESOURCE_ERROR',
      message: 'Cannot read table.csv',
    });
  });

  it('lists zod issues', () => {
    const result = z.object({ level: z.number() }).safeParse({ level: 'x' });
    if (result.success) throw new Error('expected a failure');
    const body = describeException(result.error);
    expect(body.status).toBe(422);
    expect(body.code).toBe('VALIDATION_ERROR');
    expect(body.details).toEqual([{ path: 'level', message: 'Expected number, received string' }]);
  });

  it('keeps HttpException status and message', () => {
    expect(describeException(new BadRequestException('No file provided'))).toEqual({
      status: 400,
      code: 'Bad Request',
      message: 'No file provided',
    });
    expect(describeException(new NotFoundException()).status).toBe(404);
  });

  it('falls back to 500 for anything else', () => {
    expect(describeException('weird')).toEqual({
      status: 500,
      code: 'INTERNAL_ERROR',
      message: 'An unexpected error occurred',
    });
  });
});

describe('errorResponse', () => {
  it('wraps the described exception in the error envelope', () => {
    expect(errorResponse(describeException(new AuditConfigurationError('Unknown rule level 7')))).toEqual({
      success: false,
      error: { code: 'CONFIGURATION_ERROR', message: 'Unknown rule level 7' },
    });
  });

  it('carries validation details', () => {
    const body = errorResponse({ status: 422, code: 'VALIDATION_ERROR', message: 'Request validation failed', details: [] });
    expect(body.error).toEqual({ code: 'VALIDATION_ERROR', message: 'Request validation failed', details: [] });
  });
});
