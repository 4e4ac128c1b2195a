/**
 * Deployment status poller
 *
 * One stateless read per call. The browser re-requests the status route until
 * the service reports active.
 */

import type { SessionState } from '../session/state.js';
import { resetDeployment } from '../session/transitions.js';
import type { ComputePlatform } from '../spi/index.js';
import { PreconditionError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { DRAFT_VERSION } from './pipeline.js';

export interface DeploymentCheck {
  active: boolean;
  serviceId: string;
  /** State to carry forward; deployment is reset once active */
  state: SessionState;
}

export class DeploymentStatusPoller {
  constructor(private compute: ComputePlatform) {}

  async isActive(credential: string, serviceId: string): Promise<boolean> {
    const version = await this.compute.getServiceVersion(credential, serviceId, DRAFT_VERSION);
    return version.active;
  }

  /**
   * @throws PreconditionError when no service has been provisioned or Fastly is not signed in
   */
  async check(state: SessionState): Promise<DeploymentCheck> {
    const serviceId = state.deployment.serviceId;
    if (!serviceId) {
      throw new PreconditionError('No service has been provisioned yet', 'service_id');
    }
    const credential = state.login.fastly;
    if (!credential) {
      throw new PreconditionError('Sign in to Fastly to check the deployment', 'fastly_credential');
    }

    const active = await this.isActive(credential, serviceId);
    if (active) {
      logger.info(`[provisioning] Service ${serviceId} is active`);
    }
    return { active, serviceId, state: active ? resetDeployment(state) : state };
  }
}
