export * from './standards.js';
export * from './config/env.js';
export * from './logging/json-log.js';
export * from './messaging/envelope.js';
export * from './messaging/ids.js';
export * from './messaging/contracts.js';
export * from './messaging/rabbitmq-topology.js';
export * from './messaging/rabbitmq-consumer.js';
export * from './messaging/rabbitmq-connection.js';
export * from './tenancy/identifiers.js';
export * from './text/count-characters.js';
export * from './http/http-exception.filter.js';
