/**
 * Launchpad Server - Main exports
 */

export { LaunchpadServer } from './server.js';
export type { ServerOptions } from './server.js';

export { AuthCoordinator } from './auth/auth-coordinator.js';
export type { AuthCoordinatorConfig, ProviderIdentity } from './auth/auth-coordinator.js';

export { GitHubClient } from './clients/github-client.js';
export { FastlyClient } from './clients/fastly-client.js';
export type { ApiClientOptions, FetchFn } from './clients/api-client.js';

export { RequestContext, STATE_COOKIE_OPTIONS } from './context/request-context.js';
