export const DEAD_LETTER_QUEUE_SUFFIX = '.dlq';

export const RESERVED_HEADERS = {
  testBypass: 'x-test-enabled',
  deadLetterNotified: 'dlq_notified',
} as const;

export const PERSISTENT_DELIVERY_MODE = 2;
