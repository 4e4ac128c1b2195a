/**
 * @launchpad/core
 *
 * Session model and codec, workflow transitions, deploy spec and manifest
 * handling, the provisioning pipeline and the status poller.
 */

// Session state carried in the browser cookie
export * from './session/index.js';

// Deploy spec parser and editable manifest
export * from './manifest/index.js';

// GitHub and Fastly collaborator interfaces
export * from './spi/index.js';

// Provisioning pipeline and status poller
export * from './provisioning/index.js';

// Configuration loader with secrets resolution
export * from './config/index.js';

// Utilities
export * from './utils/errors.js';
export * from './utils/logger.js';
