/**
 * Service Provider Interface (SPI) definitions
 *
 * The core talks to GitHub and Fastly only through these interfaces. Each call
 * is a single request/response that returns a typed result or throws; nothing
 * here retries or rate-limits. Credentials are passed per call so one client
 * instance serves every request.
 */

// ===== Source-control platform (GitHub) =====

export interface SourceUser {
  login: string;
  name?: string | null;
}

export interface SourceRepository {
  name: string;
  /** `owner/name` */
  full_name: string;
  owner: SourceUser;
  default_branch: string;
  description?: string | null;
  forks_count: number;
  stargazers_count: number;
  is_template: boolean;
}

/**
 * File contents read from a repository, decoded to UTF-8
 */
export interface RepositoryFile {
  path: string;
  /** Content-addressing token the conditional update is made against */
  sha: string;
  content: string;
}

export interface RepositoryPublicKey {
  key_id: string;
  /** Base64 Curve25519 public key */
  key: string;
}

export interface FileUpdate {
  path: string;
  content: string;
  sha: string;
  message: string;
}

/**
 * Source-control platform SPI
 *
 * Implementations: GitHubClient (server)
 */
export interface SourceHost {
  /** Current user, or null when the credential is rejected (401/403) */
  fetchUser(credential: string): Promise<SourceUser | null>;

  /** Public repository lookup without a credential; null when absent */
  fetchRepository(nwo: string): Promise<SourceRepository | null>;

  /** Create a repository in the user's account from a template */
  generateFromTemplate(credential: string, nwo: string, name: string): Promise<SourceRepository>;

  /** Plain fork into the user's account */
  forkRepository(credential: string, nwo: string): Promise<SourceRepository>;

  /** null when the file does not exist */
  getFile(credential: string | undefined, nwo: string, path: string): Promise<RepositoryFile | null>;

  /** Update a file, conditioned on `update.sha` */
  updateFile(credential: string, nwo: string, update: FileUpdate): Promise<void>;

  enableWorkflow(credential: string, nwo: string, workflowId: string): Promise<void>;

  getActionsPublicKey(credential: string, nwo: string): Promise<RepositoryPublicKey>;

  putActionsSecret(
    credential: string,
    nwo: string,
    name: string,
    secret: { encrypted_value: string; key_id: string }
  ): Promise<void>;
}

// ===== Compute platform (Fastly) =====

export interface ComputeUser {
  name: string;
  customer_id: string;
}

export interface ComputeService {
  id: string;
  name: string;
}

export interface ComputeBackend {
  name: string;
  address: string;
  port: number;
}

export interface ComputeDictionary {
  id: string;
  name: string;
}

export interface DictionaryItemOperation {
  op: 'create';
  item_key: string;
  item_value: string;
}

/**
 * Compute platform SPI
 *
 * Implementations: FastlyClient (server)
 */
export interface ComputePlatform {
  /** Current user, or null when the credential is rejected (401/403) */
  fetchUser(credential: string): Promise<ComputeUser | null>;

  createService(credential: string, input: { name: string; type: string }): Promise<ComputeService>;

  createDomain(credential: string, serviceId: string, version: number, name: string): Promise<{ name: string }>;

  createBackend(
    credential: string,
    serviceId: string,
    version: number,
    backend: ComputeBackend
  ): Promise<ComputeBackend>;

  createDictionary(
    credential: string,
    serviceId: string,
    version: number,
    name: string
  ): Promise<ComputeDictionary>;

  /** Bulk item update, applied as one request */
  updateDictionaryItems(
    credential: string,
    serviceId: string,
    dictionaryId: string,
    items: DictionaryItemOperation[]
  ): Promise<void>;

  getServiceVersion(
    credential: string,
    serviceId: string,
    version: number
  ): Promise<{ number: number; active: boolean }>;
}

// ===== Local collaborators =====

/**
 * Seals a secret for a repository's public key
 */
export interface SecretSealer {
  /** @returns base64 ciphertext */
  seal(plaintext: string, publicKey: string): Promise<string>;
}

/**
 * Produces a fresh, human-readable service name
 */
export type NameGenerator = () => string;
