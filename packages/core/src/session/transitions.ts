/**
 * Session transitions and the derived workflow stage
 *
 * Every function returns a new state; nothing here mutates its input.
 */

import type { DeploymentState, LoginState, Provider, SessionState } from './state.js';

export type WorkflowStage = 'idle' | 'source_selected' | 'forked' | 'provisioned';

/**
 * Identity resolved for each provider on the current request
 */
export interface IdentityView<GitHubProfile = unknown, FastlyProfile = unknown> {
  github: GitHubProfile | null;
  fastly: FastlyProfile | null;
}

/**
 * Plain data the deploy page is rendered from
 */
export interface WorkflowView {
  stage: WorkflowStage;
  source: string;
  destination?: string;
  serviceId?: string;
  domain?: string;
  canFork: boolean;
  canDeploy: boolean;
  awaitingActivation: boolean;
}

/**
 * Record the source repository in view. Switching to another source drops
 * the fork and service recorded for the previous one.
 */
export function selectSource(state: SessionState, nwo: string): SessionState {
  if (state.deployment.src === nwo) {
    return state;
  }
  return { ...state, deployment: { src: nwo } };
}

/**
 * Fork recorded for `nwo`, or undefined when the recorded fork belongs to
 * another source
 */
export function resolveDestination(state: SessionState, nwo: string): string | undefined {
  return state.deployment.src === nwo ? state.deployment.dest : undefined;
}

export function recordFork(state: SessionState, src: string, dest: string): SessionState {
  return { ...state, deployment: { src, dest } };
}

export function recordService(
  state: SessionState,
  service: { id: string; domain: string }
): SessionState {
  return {
    ...state,
    deployment: { ...state.deployment, serviceId: service.id, domain: service.domain },
  };
}

export function recordCredential(
  state: SessionState,
  provider: Provider,
  credential: string
): SessionState {
  const login: LoginState = { ...state.login, [provider]: credential };
  return { ...state, login };
}

export function resetDeployment(state: SessionState): SessionState {
  return { ...state, deployment: {} };
}

export function resetLogin(state: SessionState): SessionState {
  return { ...state, login: {} };
}

export function workflowStage(deployment: DeploymentState): WorkflowStage {
  if (!deployment.src) return 'idle';
  if (deployment.serviceId) return 'provisioned';
  if (deployment.dest) return 'forked';
  return 'source_selected';
}

export function describeWorkflow(
  state: SessionState,
  identity: IdentityView,
  nwo: string
): WorkflowView {
  const destination = resolveDestination(state, nwo);
  const matchesSource = state.deployment.src === nwo;
  const stage = matchesSource ? workflowStage(state.deployment) : 'idle';
  const signedInToGitHub = identity.github !== null;
  const signedInToFastly = identity.fastly !== null;

  return {
    stage,
    source: nwo,
    destination,
    serviceId: matchesSource ? state.deployment.serviceId : undefined,
    domain: matchesSource ? state.deployment.domain : undefined,
    canFork: signedInToGitHub && destination === undefined,
    canDeploy: signedInToGitHub && signedInToFastly && destination !== undefined && stage === 'forked',
    awaitingActivation: stage === 'provisioned',
  };
}

/**
 * Where to send the browser after an OAuth round trip or a reset
 */
export function returnLocation(state: SessionState): string {
  return state.deployment.src ? `/${state.deployment.src}` : '/';
}
