export * from './config/index.js';
export * from './logging-config.js';
export * from './exceptions.js';
export * from './version.js';

export * from './agent/views.js';
export * from './agent/link-harvester.js';
export * from './scratch/service.js';
export * from './storage/views.js';
export * from './storage/keys.js';
export * from './storage/service.js';
export * from './storage/s3-object-store.js';
export * from './extraction/views.js';
export * from './extraction/service.js';
export * from './extraction/factory.js';
export * from './services/signal-handler.js';
