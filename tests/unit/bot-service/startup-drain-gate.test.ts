import test from 'node:test';
import assert from 'node:assert/strict';
import { StartupDrainGate } from '../../../services/bot-service/src/application/queues/startup-drain-gate';

test('drain gate opens immediately when sealed with nothing pending', async () => {
  const gate = new StartupDrainGate();

  assert.equal(gate.seal(), true);
  assert.equal(gate.isDraining, false);
  assert.equal(await gate.wait(), 'drained');
});

test('drain gate opens on the Nth acknowledgment after it is sealed', async () => {
  const gate = new StartupDrainGate();
  gate.addPending(2);
  gate.addPending(1);

  assert.equal(gate.seal(), false);
  assert.equal(gate.recordAcknowledged(), false);
  assert.equal(gate.recordAcknowledged(), false);
  assert.equal(gate.isDraining, true);
  assert.equal(gate.pendingCount, 1);

  const waiting = gate.wait();
  assert.equal(gate.recordAcknowledged(), true);
  assert.equal(await waiting, 'drained');
  assert.equal(gate.recordAcknowledged(), false);
});

test('drain gate stays closed until sealed even when acknowledgments catch up', () => {
  const gate = new StartupDrainGate();
  gate.addPending(1);

  assert.equal(gate.recordAcknowledged(), false);
  assert.equal(gate.isDraining, true);
  assert.equal(gate.seal(), true);
});

test('drain gate never counts below zero', () => {
  const gate = new StartupDrainGate();

  gate.recordAcknowledged();
  gate.recordAcknowledged();

  assert.equal(gate.pendingCount, 0);
});

test('drain wait resolves with timed-out when the fallback timeout elapses', async () => {
  const gate = new StartupDrainGate();
  gate.addPending(1);
  gate.seal();

  assert.equal(await gate.wait(10), 'timed-out');
  assert.equal(gate.isDraining, true);
});
