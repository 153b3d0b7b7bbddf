import test from 'node:test';
import assert from 'node:assert/strict';
import { MessageDecodeError } from '../../../services/bot-service/src/application/queues/message-decoder';
import { QueueHandlerRegistry } from '../../../services/bot-service/src/application/queues/queue-handler-registry';
import type { WrappedQueueHandler } from '../../../services/bot-service/src/application/queues/queue-handler-registry';
import { captureLogs } from '../../support/captured-logs';
import { FakeIdempotency, createDelivery, createSettings } from '../../support/fixtures';
import { createJobDecoder, type CreateJobPayload } from '../../support/payloads';

class JobsService {}

function setup(options: { idempotent?: boolean; fail?: boolean } = {}) {
  const idempotency = new FakeIdempotency();
  const registry = new QueueHandlerRegistry(idempotency, createSettings());
  const received: CreateJobPayload[] = [];

  registry.register<CreateJobPayload>({
    queueName: 'jobs.create',
    decoder: createJobDecoder,
    idempotent: options.idempotent ?? true,
    owner: new JobsService(),
    callback: async (payload) => {
      received.push(payload);
      if (options.fail) {
        throw new Error('handler failed');
      }
    },
  });

  const handler: WrappedQueueHandler | undefined = registry.resolveAll().get('jobs.create');
  assert.ok(handler);
  return { registry, idempotency, received, handler };
}

const body = { jobId: 'job-1', prompt: 'hello' };

test('registered handler receives the decoded payload once its claim succeeds', async () => {
  const { idempotency, received, handler } = setup();

  const outcome = await handler(createDelivery({ body, messageId: 'm1' }));

  assert.equal(outcome, 'handled');
  assert.deepEqual(received, [body]);
  assert.deepEqual(idempotency.claimCalls, ['m1']);
  assert.equal(idempotency.claims.has('m1'), true);
});

test('a second delivery with the same message id is a duplicate and keeps the claim', async () => {
  const { idempotency, received, handler } = setup();

  await handler(createDelivery({ body, messageId: 'm1' }));
  const outcome = await handler(createDelivery({ body, messageId: 'm1' }));

  assert.equal(outcome, 'duplicate');
  assert.equal(received.length, 1);
  assert.deepEqual(idempotency.deleteCalls, []);
  assert.equal(idempotency.claims.has('m1'), true);
});

test('test-bypass header acknowledges without decoding or claiming', async () => {
  const { idempotency, received, handler } = setup();

  const outcome = await handler(createDelivery({
    body: 'not json',
    messageId: 'm1',
    headers: { 'x-test-enabled': 'true' },
  }));

  assert.equal(outcome, 'bypassed');
  assert.deepEqual(received, []);
  assert.deepEqual(idempotency.claimCalls, []);
});

test('undecodable body throws a decode error before any claim is taken', async () => {
  const { idempotency, received, handler } = setup();

  await assert.rejects(
    handler(createDelivery({ body: Buffer.from('{not json'), messageId: 'm1' })),
    MessageDecodeError,
  );
  await assert.rejects(
    handler(createDelivery({ body: { jobId: 1 }, messageId: 'm2' })),
    /payload does not match the expected shape/,
  );
  assert.deepEqual(received, []);
  assert.deepEqual(idempotency.claimCalls, []);
});

test('handler failure deletes the claim and rethrows the original error', async () => {
  const { idempotency, handler } = setup({ fail: true });

  await assert.rejects(handler(createDelivery({ body, messageId: 'm1' })), /handler failed/);

  assert.deepEqual(idempotency.deleteCalls, ['m1']);
  assert.equal(idempotency.claims.has('m1'), false);
});

test('a failed claim deletion is logged and the handler error still propagates', async () => {
  const logs = captureLogs();
  const { idempotency, handler } = setup({ fail: true });
  idempotency.failDeletes = true;

  await assert.rejects(handler(createDelivery({ body, messageId: 'm1' })), /handler failed/);

  const warning = logs.find((line) => line.level === 'warn');
  assert.equal(warning?.entry.message, 'Failed to delete idempotency claim after handler error.');
  assert.equal(warning?.entry.messageId, 'm1');
});

test('non-idempotent handlers and messages without an id skip the claim', async () => {
  const nonIdempotent = setup({ idempotent: false });
  await nonIdempotent.handler(createDelivery({ body, messageId: 'm1' }));
  assert.deepEqual(nonIdempotent.idempotency.claimCalls, []);

  const withoutId = setup();
  const outcome = await withoutId.handler(createDelivery({ body }));
  assert.equal(outcome, 'handled');
  assert.deepEqual(withoutId.idempotency.claimCalls, []);
  assert.equal(withoutId.received.length, 1);
});

test('a second registration for the same queue is rejected and the first one wins', async () => {
  const logs = captureLogs();
  const { registry, received } = setup();

  const accepted = registry.register({
    queueName: ' jobs.create ',
    decoder: createJobDecoder,
    owner: new JobsService(),
    callback: async () => {
      throw new Error('should not run');
    },
  });

  assert.equal(accepted, false);
  assert.equal(registry.list().length, 1);
  assert.equal(registry.list()[0]?.ownerName, 'JobsService');

  const handler = registry.resolveAll().get('jobs.create');
  assert.ok(handler);
  await handler(createDelivery({ body, messageId: 'm9' }));
  assert.equal(received.length, 1);

  const error = logs.find((line) => line.level === 'error');
  assert.equal(error?.entry.queue, 'jobs.create');
});

test('registration refuses a dead-letter queue name', () => {
  const { registry } = setup();

  assert.throws(
    () => registry.register({
      queueName: 'jobs.create.dlq',
      decoder: createJobDecoder,
      owner: new JobsService(),
      callback: async () => undefined,
    }),
    /reserved for dead letters/,
  );
});
