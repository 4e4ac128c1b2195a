/**
 * Provisioning pipeline
 *
 * Turns a forked repository and its deploy spec into a live service through a
 * fixed sequence of GitHub and Fastly calls.
 *
 * Flow: name → service → domain → backends → dictionaries → workflow → secret → manifest
 *
 * Each step runs once, in order, awaiting the previous one. The first failure
 * stops the run and propagates unchanged. Resources created by earlier steps
 * stay where they are; the warning logged on failure lists them.
 */

import type { DeployConfigSpec, BackendSpec } from '../manifest/deploy-spec.js';
import { EditableManifest } from '../manifest/service-manifest.js';
import type {
  ComputePlatform,
  DictionaryItemOperation,
  NameGenerator,
  RepositoryFile,
  SecretSealer,
  SourceHost,
} from '../spi/index.js';
import { MissingValueError, PreconditionError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { generateServiceName } from './service-name.js';

/** Services are configured on their first, still-editable version */
export const DRAFT_VERSION = 1;

export const DEFAULT_BACKEND: Readonly<BackendSpec> = {
  name: '127.0.0.1',
  address: '127.0.0.1',
};

export const DEFAULT_BACKEND_PORT = 80;

export type ProvisioningStepName =
  | 'generate_name'
  | 'create_service'
  | 'create_domain'
  | 'create_backends'
  | 'populate_dictionaries'
  | 'enable_workflow'
  | 'store_secret'
  | 'push_manifest';

export interface ProvisioningRequest {
  /** Forked repository, `owner/name` */
  destination: string;
  /** Manifest as read from the destination, sha included */
  manifest: RepositoryFile;
  spec: DeployConfigSpec;
  /** Submitted values keyed `<dictionary>.<key>` */
  overrides: Record<string, string>;
  credentials: { github: string; fastly: string };
  /** Pre-selected service name; generated when absent */
  serviceName?: string;
}

export interface CreatedService {
  id: string;
  domain: string;
}

/**
 * Ids of everything created so far in one run
 */
export interface ExternalResourceRefs {
  serviceName?: string;
  serviceId?: string;
  domain?: string;
  backends: string[];
  dictionaries: Array<{ id: string; name: string }>;
  publicKeyId?: string;
}

export interface ProvisioningOptions {
  domainSuffix: string;
  serviceType: string;
  workflowId: string;
  secretName: string;
  commitMessage: string;
}

export interface ProvisioningDependencies {
  source: SourceHost;
  compute: ComputePlatform;
  sealer: SecretSealer;
  generateName?: NameGenerator;
}

interface ProvisioningContext {
  request: ProvisioningRequest;
  manifest: EditableManifest;
  refs: ExternalResourceRefs;
}

interface ProvisioningStep {
  name: ProvisioningStepName;
  run(ctx: ProvisioningContext): Promise<void>;
}

/**
 * Resolve the value of one dictionary item: submitted value, then declared
 * default. An empty submission counts as no submission.
 *
 * @throws MissingValueError when neither is present
 */
export function resolveItemValue(
  dictionary: string,
  item: { key: string; value?: string },
  overrides: Record<string, string>
): string {
  const submitted = overrides[`${dictionary}.${item.key}`];
  if (submitted !== undefined && submitted !== '') {
    return submitted;
  }
  if (item.value !== undefined) {
    return item.value;
  }
  throw new MissingValueError(item.key);
}

export function backendsToCreate(spec: DeployConfigSpec): BackendSpec[] {
  return spec.backends.length > 0 ? spec.backends : [DEFAULT_BACKEND];
}

export class ProvisioningPipeline {
  private readonly generateName: NameGenerator;
  private readonly steps: readonly ProvisioningStep[];

  constructor(
    private deps: ProvisioningDependencies,
    private options: ProvisioningOptions
  ) {
    this.generateName = deps.generateName ?? generateServiceName;
    this.steps = [
      { name: 'generate_name', run: ctx => this.chooseName(ctx) },
      { name: 'create_service', run: ctx => this.createService(ctx) },
      { name: 'create_domain', run: ctx => this.createDomain(ctx) },
      { name: 'create_backends', run: ctx => this.createBackends(ctx) },
      { name: 'populate_dictionaries', run: ctx => this.populateDictionaries(ctx) },
      { name: 'enable_workflow', run: ctx => this.enableWorkflow(ctx) },
      { name: 'store_secret', run: ctx => this.storeSecret(ctx) },
      { name: 'push_manifest', run: ctx => this.pushManifest(ctx) },
    ];
  }

  get stepNames(): ProvisioningStepName[] {
    return this.steps.map(step => step.name);
  }

  /**
   * @throws the first error raised by any step, unchanged
   */
  async run(request: ProvisioningRequest): Promise<CreatedService> {
    // Pure; a malformed manifest fails before anything exists remotely
    const manifest = EditableManifest.load(request.manifest.content);

    const ctx: ProvisioningContext = {
      request,
      manifest,
      refs: { backends: [], dictionaries: [] },
    };

    logger.info(`[provisioning] Provisioning ${request.destination}`);

    for (const step of this.steps) {
      logger.debug(`[provisioning] Step ${step.name}`);
      try {
        await step.run(ctx);
      } catch (error) {
        logger.warn(
          { step: step.name, created: ctx.refs },
          `[provisioning] Aborted at ${step.name} for ${request.destination}; created resources were left in place`
        );
        throw error;
      }
    }

    const serviceId = requireRef(ctx.refs.serviceId, 'service_id');
    const domain = requireRef(ctx.refs.domain, 'domain');

    logger.info(`[provisioning] Provisioned service ${serviceId} at ${domain}`);
    return { id: serviceId, domain };
  }

  private async chooseName(ctx: ProvisioningContext): Promise<void> {
    ctx.refs.serviceName = ctx.request.serviceName ?? this.generateName();
  }

  private async createService(ctx: ProvisioningContext): Promise<void> {
    const name = requireRef(ctx.refs.serviceName, 'service_name');
    const service = await this.deps.compute.createService(ctx.request.credentials.fastly, {
      name,
      type: this.options.serviceType,
    });
    ctx.refs.serviceId = service.id;
    logger.info(`[provisioning] Created service ${service.id}`);
  }

  private async createDomain(ctx: ProvisioningContext): Promise<void> {
    const serviceId = requireRef(ctx.refs.serviceId, 'service_id');
    const name = `${requireRef(ctx.refs.serviceName, 'service_name')}.${this.options.domainSuffix}`;
    const domain = await this.deps.compute.createDomain(
      ctx.request.credentials.fastly,
      serviceId,
      DRAFT_VERSION,
      name
    );
    ctx.refs.domain = domain.name;
    logger.info(`[provisioning] Created domain ${domain.name}`);
  }

  private async createBackends(ctx: ProvisioningContext): Promise<void> {
    const serviceId = requireRef(ctx.refs.serviceId, 'service_id');
    for (const backend of backendsToCreate(ctx.request.spec)) {
      await this.deps.compute.createBackend(ctx.request.credentials.fastly, serviceId, DRAFT_VERSION, {
        name: backend.name,
        address: backend.address,
        port: backend.port ?? DEFAULT_BACKEND_PORT,
      });
      ctx.refs.backends.push(backend.name);
      logger.info(`[provisioning] Created backend ${backend.name}`);
    }
  }

  private async populateDictionaries(ctx: ProvisioningContext): Promise<void> {
    const serviceId = requireRef(ctx.refs.serviceId, 'service_id');
    const credential = ctx.request.credentials.fastly;

    for (const dictionary of ctx.request.spec.dictionaries) {
      const created = await this.deps.compute.createDictionary(
        credential,
        serviceId,
        DRAFT_VERSION,
        dictionary.name
      );
      ctx.refs.dictionaries.push({ id: created.id, name: created.name });
      logger.info(`[provisioning] Created dictionary ${dictionary.name}`);

      const items: DictionaryItemOperation[] = dictionary.items.map(item => ({
        op: 'create',
        item_key: item.key,
        item_value: resolveItemValue(dictionary.name, item, ctx.request.overrides),
      }));

      if (items.length === 0) {
        continue;
      }

      await this.deps.compute.updateDictionaryItems(credential, serviceId, created.id, items);
      logger.info(`[provisioning] Populated dictionary ${dictionary.name} with ${items.length} items`);
    }
  }

  private async enableWorkflow(ctx: ProvisioningContext): Promise<void> {
    await this.deps.source.enableWorkflow(
      ctx.request.credentials.github,
      ctx.request.destination,
      this.options.workflowId
    );
    logger.info(`[provisioning] Enabled workflow ${this.options.workflowId}`);
  }

  private async storeSecret(ctx: ProvisioningContext): Promise<void> {
    const { github, fastly } = ctx.request.credentials;
    const publicKey = await this.deps.source.getActionsPublicKey(github, ctx.request.destination);
    ctx.refs.publicKeyId = publicKey.key_id;

    const encrypted = await this.deps.sealer.seal(fastly, publicKey.key);
    await this.deps.source.putActionsSecret(github, ctx.request.destination, this.options.secretName, {
      encrypted_value: encrypted,
      key_id: publicKey.key_id,
    });
    logger.info(`[provisioning] Stored repository secret ${this.options.secretName}`);
  }

  private async pushManifest(ctx: ProvisioningContext): Promise<void> {
    const { destination, manifest: original, credentials } = ctx.request;

    const current = await this.deps.source.getFile(credentials.github, destination, original.path);
    if (!current || current.sha !== original.sha) {
      throw new PreconditionError(
        `${original.path} in ${destination} changed after it was read; not overwriting it`,
        'manifest_sha'
      );
    }

    ctx.manifest.setServiceId(requireRef(ctx.refs.serviceId, 'service_id'));
    await this.deps.source.updateFile(credentials.github, destination, {
      path: original.path,
      content: ctx.manifest.render(),
      sha: original.sha,
      message: this.options.commitMessage,
    });
    logger.info(`[provisioning] Pushed ${original.path} to ${destination}`);
  }
}

function requireRef<T>(value: T | undefined, fact: string): T {
  if (value === undefined) {
    throw new PreconditionError(`Provisioning step ran before ${fact} was known`, fact);
  }
  return value;
}
