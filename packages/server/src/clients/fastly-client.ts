/**
 * Fastly REST client
 *
 * Implements the ComputePlatform SPI. Creation endpoints take form-encoded
 * bodies; the bulk dictionary item update takes JSON.
 */

import type {
  ComputeBackend,
  ComputeDictionary,
  ComputePlatform,
  ComputeService,
  ComputeUser,
  DictionaryItemOperation,
} from '@launchpad/core';
import { z } from 'zod';
import { ApiClient, type ApiClientOptions } from './api-client.js';

const userSchema = z.object({
  name: z.string(),
  customer_id: z.string(),
});

const serviceSchema = z.object({
  id: z.string(),
  name: z.string(),
});

const domainSchema = z.object({
  name: z.string(),
});

const backendSchema = z.object({
  name: z.string(),
  address: z.string(),
  port: z.coerce.number().int(),
});

const dictionarySchema = z.object({
  id: z.string(),
  name: z.string(),
});

const versionSchema = z.object({
  number: z.number().int(),
  active: z.boolean(),
});

export class FastlyClient extends ApiClient implements ComputePlatform {
  constructor(options: ApiClientOptions) {
    super('fastly', options);
  }

  protected get accept(): string {
    return 'application/json';
  }

  protected authHeaders(credential: string): Record<string, string> {
    return { 'Fastly-Key': credential };
  }

  async fetchUser(credential: string): Promise<ComputeUser | null> {
    const response = await this.send('Unable to load Fastly user', 'GET', '/current_user', { credential });
    if (response.status === 401 || response.status === 403) {
      return null;
    }
    return this.parse('Unable to load Fastly user', response, userSchema);
  }

  async createService(credential: string, input: { name: string; type: string }): Promise<ComputeService> {
    const action = `Unable to create service ${input.name}`;
    const response = await this.send(action, 'POST', '/service', {
      credential,
      form: { name: input.name, type: input.type },
    });
    return this.parse(action, response, serviceSchema);
  }

  async createDomain(
    credential: string,
    serviceId: string,
    version: number,
    name: string
  ): Promise<{ name: string }> {
    const action = `Unable to create domain ${name}`;
    const response = await this.send(action, 'POST', `${versionPath(serviceId, version)}/domain`, {
      credential,
      form: { name },
    });
    return this.parse(action, response, domainSchema);
  }

  async createBackend(
    credential: string,
    serviceId: string,
    version: number,
    backend: ComputeBackend
  ): Promise<ComputeBackend> {
    const action = `Unable to create backend ${backend.name}`;
    const response = await this.send(action, 'POST', `${versionPath(serviceId, version)}/backend`, {
      credential,
      form: { name: backend.name, address: backend.address, port: backend.port },
    });
    return this.parse(action, response, backendSchema);
  }

  async createDictionary(
    credential: string,
    serviceId: string,
    version: number,
    name: string
  ): Promise<ComputeDictionary> {
    const action = `Unable to create dictionary ${name}`;
    const response = await this.send(action, 'POST', `${versionPath(serviceId, version)}/dictionary`, {
      credential,
      form: { name },
    });
    return this.parse(action, response, dictionarySchema);
  }

  async updateDictionaryItems(
    credential: string,
    serviceId: string,
    dictionaryId: string,
    items: DictionaryItemOperation[]
  ): Promise<void> {
    const action = `Unable to populate dictionary ${dictionaryId}`;
    const response = await this.send(
      action,
      'PATCH',
      `/service/${encodeURIComponent(serviceId)}/dictionary/${encodeURIComponent(dictionaryId)}/items`,
      { credential, json: { items } }
    );
    await this.expectOk(action, response);
  }

  async getServiceVersion(
    credential: string,
    serviceId: string,
    version: number
  ): Promise<{ number: number; active: boolean }> {
    const action = `Unable to read version ${version} of service ${serviceId}`;
    const response = await this.send(action, 'GET', versionPath(serviceId, version), { credential });
    return this.parse(action, response, versionSchema);
  }
}

function versionPath(serviceId: string, version: number): string {
  return `/service/${encodeURIComponent(serviceId)}/version/${version}`;
}
