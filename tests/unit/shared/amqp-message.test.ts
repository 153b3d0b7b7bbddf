import test from 'node:test';
import assert from 'node:assert/strict';
import {
  copyHeaders,
  createAmqpMessageLogLine,
  formatDeadLetterAlert,
  isHeaderFlagSet,
  renderBodyForAlert,
} from '../../../packages/shared/src/messaging/amqp-message';
import { ensureMessageId } from '../../../packages/shared/src/messaging/ids';

test('header flags accept booleans, 1 and their string forms', () => {
  assert.equal(isHeaderFlagSet(true), true);
  assert.equal(isHeaderFlagSet(1), true);
  assert.equal(isHeaderFlagSet(' TRUE '), true);
  assert.equal(isHeaderFlagSet('1'), true);
  assert.equal(isHeaderFlagSet(false), false);
  assert.equal(isHeaderFlagSet('yes'), false);
  assert.equal(isHeaderFlagSet(undefined), false);
});

test('copyHeaders returns a detached copy and ignores non-objects', () => {
  const headers = { a: 1 };
  const copy = copyHeaders(headers);
  copy.b = 2;

  assert.deepEqual(headers, { a: 1 });
  assert.deepEqual(copyHeaders(undefined), {});
  assert.deepEqual(copyHeaders(['a']), {});
});

test('alert bodies are truncated with a marker', () => {
  assert.equal(renderBodyForAlert(Buffer.from('abcdef'), 6), 'abcdef');
  assert.equal(renderBodyForAlert(Buffer.from('abcdef'), 3), 'abc... (truncated)');
});

test('alert body truncation keeps surrogate pairs whole', () => {
  const body = Buffer.from('ab\u{1F600}cd', 'utf-8');

  assert.equal(renderBodyForAlert(body, 3), 'ab... (truncated)');
  assert.equal(renderBodyForAlert(body, 4), 'ab\u{1F600}... (truncated)');
});

test('dead-letter alert names the queue and fences the body as json', () => {
  assert.equal(
    formatDeadLetterAlert('jobs.create.dlq', Buffer.from('{"a":1}'), 100),
    '### jobs.create.dlq\n```json\n{"a":1}\n```',
  );
});

test('AMQP log line carries the message ids and falls back to an unknown correlation id', () => {
  const line = createAmqpMessageLogLine({
    level: 'error',
    service: 'bot-service',
    message: 'failed',
    queue: 'jobs.create',
    amqpMessage: {
      content: Buffer.from('{}'),
      fields: { routingKey: 'jobs.create' },
      properties: { messageId: 'm1', type: 'CreateJob' },
    },
    error: new Error('boom'),
  });
  const entry: unknown = JSON.parse(line);

  assert.ok(typeof entry === 'object' && entry !== null);
  assert.equal(Reflect.get(entry, 'correlationId'), 'unknown');
  assert.equal(Reflect.get(entry, 'messageId'), 'm1');
  assert.equal(Reflect.get(entry, 'messageType'), 'CreateJob');
  assert.equal(Reflect.get(entry, 'routingKey'), 'jobs.create');
  assert.equal(Reflect.get(entry, 'queue'), 'jobs.create');
  assert.equal(Reflect.get(Reflect.get(entry, 'error'), 'message'), 'boom');
});

test('ensureMessageId keeps a provided id and generates one otherwise', () => {
  assert.equal(ensureMessageId('m1'), 'm1');
  assert.match(ensureMessageId('  '), /^[0-9a-f-]{36}$/);
  assert.notEqual(ensureMessageId(), ensureMessageId());
});
