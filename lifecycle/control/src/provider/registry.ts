// provider/registry.ts - Provider Construction & Host-Facing Dispatch
//
// The host calls in with a resource type name ("lambdalabs_instance") and
// raw configuration; this layer binds the configuration to the typed record
// and hands it to the matching controller. No other logic lives here.

import {
  ValidationError,
  PROVIDER_TYPE_NAME,
  bindInstanceConfig,
  bindSshKeyConfig,
  bindProviderConfig,
  resourceTypeName,
  type ResourceKind,
  type ResourceHandle,
  type InstanceDesired,
  type InstanceState,
  type SshKeyDesired,
  type SshKeyState,
  type CreateResult,
  type ReadOutcome,
  type DeleteOutcome,
  type Value,
} from "@gpuform/contracts";
import { LambdaClient } from "./client";
import { resolveLambdaConfig } from "./config";
import { InstanceController } from "./resources/instance";
import { SshKeyController } from "./resources/ssh-key";
import { requireHandle } from "./resources/identity";
import { withProviderErrorMapping } from "./errors";
import type { ResourceController } from "./types";

// =============================================================================
// Per-Resource Reconciler
// =============================================================================

function isHandle<S>(target: ResourceHandle | S): target is ResourceHandle {
  return typeof target === "string";
}

export class ResourceReconciler<D, S extends { id: Value<ResourceHandle> }> {
  constructor(
    readonly typeName: string,
    readonly controller: ResourceController<D, S>,
    private readonly bind: (config: unknown) => D,
  ) {}

  get kind(): ResourceKind {
    return this.controller.kind;
  }

  plan(config: unknown): S {
    return this.controller.plan(this.bind(config));
  }

  async create(config: unknown, signal?: AbortSignal): Promise<CreateResult<S>> {
    const desired = this.bind(config);
    return withProviderErrorMapping("lambda", () => this.controller.create(desired, signal));
  }

  async read(target: ResourceHandle | S, signal?: AbortSignal): Promise<ReadOutcome<S>> {
    return withProviderErrorMapping("lambda", () => this.controller.read(target, signal));
  }

  update(prior: S, config: unknown): S {
    return this.controller.update(prior, this.bind(config));
  }

  /** Identity fields the new configuration would change */
  requiresReplace(prior: S, config: unknown): string[] {
    return this.controller.identityChanges(prior, this.bind(config));
  }

  async delete(target: ResourceHandle | S, signal?: AbortSignal): Promise<DeleteOutcome> {
    const handle = isHandle(target) ? target : requireHandle(target.id, this.typeName);
    return withProviderErrorMapping("lambda", () => this.controller.delete(handle, signal));
  }

  importState(externalId: string): ResourceHandle {
    return this.controller.importState(externalId);
  }
}

export type InstanceReconciler = ResourceReconciler<InstanceDesired, InstanceState>;
export type SshKeyReconciler = ResourceReconciler<SshKeyDesired, SshKeyState>;
export type AnyReconciler = InstanceReconciler | SshKeyReconciler;

// =============================================================================
// Resource Registry
// =============================================================================

export const resourceRegistry = {
  instance: (client: LambdaClient, providerTypeName: string): InstanceReconciler =>
    new ResourceReconciler(
      resourceTypeName("instance", providerTypeName),
      new InstanceController(client),
      bindInstanceConfig,
    ),
  ssh_key: (client: LambdaClient, providerTypeName: string): SshKeyReconciler =>
    new ResourceReconciler(
      resourceTypeName("ssh_key", providerTypeName),
      new SshKeyController(client),
      bindSshKeyConfig,
    ),
} as const satisfies Record<ResourceKind, (client: LambdaClient, providerTypeName: string) => AnyReconciler>;

// =============================================================================
// Provider
// =============================================================================

export interface ProviderOptions {
  /** Overrides providers.toml and LAMBDA_API_KEY */
  apiKey?: string;
  apiBase?: string;
  version?: string;
  /** For tests only: inject a custom fetch implementation. */
  fetchImpl?: typeof fetch;
}

export class LambdaProvider {
  readonly typeName = PROVIDER_TYPE_NAME;
  readonly instances: InstanceReconciler;
  readonly sshKeys: SshKeyReconciler;

  constructor(
    client: LambdaClient,
    readonly version: string,
  ) {
    this.instances = resourceRegistry.instance(client, this.typeName);
    this.sshKeys = resourceRegistry.ssh_key(client, this.typeName);
  }

  resources(): AnyReconciler[] {
    return [this.instances, this.sshKeys];
  }

  resourceTypeNames(): string[] {
    return this.resources().map((r) => r.typeName);
  }

  /** Look up by host type name, e.g. "lambdalabs_sshkey" */
  resource(typeName: string): AnyReconciler {
    const found = this.resources().find((r) => r.typeName === typeName);
    if (!found) {
      throw new ValidationError(`Unknown resource type: ${typeName}`, {
        code: "INVALID_INPUT",
        details: { typeName, known: this.resourceTypeNames() },
      });
    }
    return found;
  }
}

/**
 * Resolve the credential and build every controller around one client.
 * Throws ConfigurationError when no API key can be found.
 */
export function createProvider(options: ProviderOptions = {}): LambdaProvider {
  const explicit = bindProviderConfig({
    ...(options.apiKey !== undefined ? { api_key: options.apiKey } : {}),
    ...(options.apiBase !== undefined ? { api_base: options.apiBase } : {}),
  });
  const { apiKey, apiBase } = resolveLambdaConfig(explicit);

  const client = new LambdaClient({ apiKey, apiBase, fetchImpl: options.fetchImpl });
  console.debug(`[lambda] provider configured (${apiBase})`);
  return new LambdaProvider(client, options.version ?? "dev");
}
