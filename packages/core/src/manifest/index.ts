export * from './deploy-spec.js';
export * from './service-manifest.js';
