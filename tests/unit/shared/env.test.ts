import test from 'node:test';
import assert from 'node:assert/strict';
import { createEnvParsers } from '../../../packages/shared/src/config/env';

const parse = createEnvParsers('test-service');

test('integer parsers fall back on empty values and reject out-of-range ones', () => {
  assert.equal(parse.positiveInt(undefined, 7, 'PORT'), 7);
  assert.equal(parse.positiveInt('', 7, 'PORT'), 7);
  assert.equal(parse.positiveInt('8080', 7, 'PORT'), 8080);
  assert.equal(parse.nonNegativeInt('0', 50, 'RATE'), 0);

  assert.throws(() => parse.positiveInt('0', 7, 'PORT'), /^Error: \[test-service\] PORT must be a positive integer\.$/);
  assert.throws(() => parse.nonNegativeInt('-1', 50, 'RATE'), /RATE must be a non-negative integer/);
  assert.throws(() => parse.positiveInt('abc', 7, 'PORT'), /PORT must be a positive integer/);
});

test('boolean parser accepts true/false in any case only', () => {
  assert.equal(parse.boolean(' TRUE ', false, 'FLAG'), true);
  assert.equal(parse.boolean('false', true, 'FLAG'), false);
  assert.equal(parse.boolean(undefined, true, 'FLAG'), true);
  assert.throws(() => parse.boolean('yes', false, 'FLAG'), /FLAG must be "true" or "false"/);
});

test('string parsers trim and treat blank as absent', () => {
  assert.equal(parse.optionalString('  value '), 'value');
  assert.equal(parse.optionalString('   '), undefined);
  assert.equal(parse.optionalString(12), undefined);
  assert.equal(parse.requiredString('x', 'NAME'), 'x');
  assert.throws(() => parse.requiredString(' ', 'NAME'), /\[test-service\] NAME is required\./);
});

test('oneOf lowercases the value and lists the allowed set on failure', () => {
  const drivers = ['minio', 'postgres', 'memory'] as const;
  assert.equal(parse.oneOf('Postgres', drivers, 'minio', 'DRIVER'), 'postgres');
  assert.equal(parse.oneOf(undefined, drivers, 'minio', 'DRIVER'), 'minio');
  assert.throws(() => parse.oneOf('s3', drivers, 'minio', 'DRIVER'), /DRIVER must be one of: minio, postgres, memory\./);
});
