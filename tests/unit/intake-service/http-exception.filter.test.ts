import test from 'node:test';
import assert from 'node:assert/strict';
import {
  BadRequestException,
  NotFoundException,
  UnsupportedMediaTypeException,
} from '@nestjs/common';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { HttpExceptionFilter } from '../../../packages/shared/src/http/http-exception.filter';
import { ValidationError } from '../../../services/intake-service/src/domain/ingest/validation.error';
import { mapIntakeDomainError } from '../../../services/intake-service/src/presentation/http/common/intake-error.mapper';

class ResponseRecorder {
  readonly headers = new Map<string, string>();
  statusCode?: number;
  body?: unknown;

  setHeader(name: string, value: string): void {
    this.headers.set(name, value);
  }

  status(code: number): ResponseRecorder {
    this.statusCode = code;
    return this;
  }

  json(body: unknown): void {
    this.body = body;
  }
}

function runFilter(exception: unknown, headers: Record<string, string> = { 'x-correlation-id': 'corr-1' }) {
  const request = { headers, method: 'POST', originalUrl: '/ingest' };
  const response = new ResponseRecorder();
  const filter = new HttpExceptionFilter('intake-service', mapIntakeDomainError);

  filter.catch(exception, new ExecutionContextHost([request, response]));
  return response;
}

test('ValidationError becomes 400 with the message as detail', () => {
  const response = runFilter(new ValidationError('tenant_id', 'Missing tenant_id in JSON payload'));

  assert.equal(response.statusCode, 400);
  assert.deepEqual(response.body, { detail: 'Missing tenant_id in JSON payload' });
  assert.equal(response.headers.get('x-correlation-id'), 'corr-1');
});

test('HttpExceptions keep their status and message', () => {
  const unsupported = runFilter(new UnsupportedMediaTypeException('Unsupported content type: application/xml'));
  assert.equal(unsupported.statusCode, 415);
  assert.deepEqual(unsupported.body, { detail: 'Unsupported content type: application/xml' });

  const notFound = runFilter(new NotFoundException('No processed log log-1 for tenant acme'));
  assert.equal(notFound.statusCode, 404);
  assert.deepEqual(notFound.body, { detail: 'No processed log log-1 for tenant acme' });

  const listMessage = runFilter(new BadRequestException(['first problem', 'second problem']));
  assert.equal(listMessage.statusCode, 400);
  assert.deepEqual(listMessage.body, { detail: 'first problem' });
});

test('unknown errors become a generic 500 and get a generated correlation id', () => {
  const response = runFilter(new Error('database password leaked in message'), {});

  assert.equal(response.statusCode, 500);
  assert.deepEqual(response.body, { detail: 'Internal server error' });
  assert.match(response.headers.get('x-correlation-id') ?? '', /^[0-9a-f-]{36}$/);
});
