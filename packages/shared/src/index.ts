export * from './standards.js';
export * from './logging/json-log.js';
export * from './messaging/ids.js';
export * from './messaging/naming.js';
export * from './messaging/amqp-message.js';
export * from './async/settle.js';
