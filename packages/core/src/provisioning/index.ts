export * from './pipeline.js';
export * from './status-poller.js';
export * from './service-name.js';
export * from './sealed-box.js';
