import { once } from 'node:events';
import type { BrokerChannel } from './ports/broker-channels.port';

export class BrokerChannelClosedError extends Error {
  constructor() {
    super('Broker channel closed while waiting for its write buffer to drain.');
    this.name = 'BrokerChannelClosedError';
  }
}

/**
 * Waits for `drain` after a publish reported a full write buffer. Rejects when
 * the channel closes or errors first.
 */
export async function waitForDrain(channel: BrokerChannel): Promise<void> {
  const abort = new AbortController();
  const closed = once(channel, 'close', { signal: abort.signal }).then(() => {
    throw new BrokerChannelClosedError();
  });

  try {
    await Promise.race([once(channel, 'drain', { signal: abort.signal }), closed]);
  } finally {
    abort.abort();
  }
}
