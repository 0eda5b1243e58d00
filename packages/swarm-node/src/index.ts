import './compat.js';
export * from './constants.js';
export * from './errors.js';
export { createLogger, type Logger } from './logger.js';
export { createLifetime } from './lifetime.js';
export * from './repo/config.js';
export * from './repo/repo-store.js';
export { MIGRATIONS, planMigrations, type Migration } from './repo/migrations.js';
export * from './storage/storage-monitor.js';
export * from './node/node-handle.js';
export * from './node/node-factory.js';
export * from './reachability/probe.js';
export * from './relay/circuit.js';
export * from './relay/relay-reconfigurer.js';
export * from './peering/peering-service.js';
export * from './bootstrap/peer-bootstrapper.js';
export * from './supervisor.js';
