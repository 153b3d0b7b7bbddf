export const QUEUE_CONSUMER_SETTINGS = Symbol('QUEUE_CONSUMER_SETTINGS');

export interface QueueConsumerSettings {
  testBypassHeader: string;
  deadLetterNotifiedHeader: string;
  sweepIntervalMs: number;
  maxPerQueuePerSweep: number;
  deadLetterGetTimeoutMs: number;
  alertBodyMaxChars: number;
  /** Zero disables the fallback timeout on the startup drain wait. */
  startupDrainTimeoutMs: number;
  resubscribeDelayMs: number;
}
