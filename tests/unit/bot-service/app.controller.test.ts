import test from 'node:test';
import assert from 'node:assert/strict';
import { Logger, ServiceUnavailableException } from '@nestjs/common';
import { ServiceInfoQuery } from '../../../services/bot-service/src/application/system/service-info.query';
import { AppController } from '../../../services/bot-service/src/presentation/http/app.controller';
import { createRuntime } from '../../support/runtime';

Logger.overrideLogger(false);

test('health reports the bot service as a worker', () => {
  const runtime = createRuntime();
  const controller = new AppController(new ServiceInfoQuery(), runtime.engine);

  const health = controller.getHealth();

  assert.equal(health.service, 'bot-service');
  assert.equal(health.status, 'ok');
});

test('readiness is unavailable until the startup backlog has drained', async (t) => {
  const runtime = createRuntime();
  t.after(() => runtime.stop());
  const controller = new AppController(new ServiceInfoQuery(), runtime.engine);

  assert.throws(() => controller.getReadiness(), ServiceUnavailableException);

  await runtime.engine.start();

  assert.deepEqual(controller.getReadiness(), { drained: true, pending: 0, queues: [] });
});
