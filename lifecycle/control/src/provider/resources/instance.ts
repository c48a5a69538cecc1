// provider/resources/instance.ts - Lambda GPU instance controller
//
// Launch, refresh, terminate and import single instances. The service only
// launches and terminates; nothing about a running instance can be changed,
// so Update is local bookkeeping.

import {
  ValidationError,
  INSTANCE_IDENTITY_FIELDS,
  absent,
  pending,
  known,
  fromOptional,
  fromRemote,
  bindHandle,
  type InstanceDesired,
  type InstanceState,
  type ResourceHandle,
  type CreateResult,
  type ReadOutcome,
  type DeleteOutcome,
  type Value,
} from "@gpuform/contracts";
import type { LambdaClient } from "../client";
import { ResponseCardinalityError, isNotFound } from "../errors";
import {
  GetInstanceResponseSchema,
  LaunchResponseSchema,
  TerminateResponseSchema,
  type LambdaRawInstance,
  type LaunchRequest,
  type TerminateRequest,
  type ResourceController,
} from "../types";
import { compareFields, requireHandle, requiresReplacement } from "./identity";

// =============================================================================
// Validation
// =============================================================================

export function validateInstanceDesired(desired: InstanceDesired): void {
  if (!desired.regionName) {
    throw new ValidationError("region_name must not be empty", { code: "INVALID_INPUT" });
  }
  if (!desired.instanceTypeName) {
    throw new ValidationError("instance_type_name must not be empty", { code: "INVALID_INPUT" });
  }
  if (desired.sshKeyNames.length !== 1) {
    throw new ValidationError(
      `Currently, exactly one SSH key must be specified, got ${desired.sshKeyNames.length}`,
      { code: "INVALID_SSH_KEY_COUNT", details: { count: desired.sshKeyNames.length } },
    );
  }
  const fileSystems = desired.fileSystemNames ?? [];
  if (fileSystems.length > 1) {
    throw new ValidationError(
      `Currently, only one (if any) file system may be specified, got ${fileSystems.length}`,
      { code: "INVALID_FILE_SYSTEM_COUNT", details: { count: fileSystems.length } },
    );
  }
}

// =============================================================================
// Projection
// =============================================================================

/** Record before the instance exists: everything the service assigns is pending */
export function planInstance(desired: InstanceDesired): InstanceState {
  return {
    id: pending(),
    regionName: desired.regionName,
    instanceTypeName: desired.instanceTypeName,
    sshKeyNames: [...desired.sshKeyNames],
    fileSystemNames: fromOptional(desired.fileSystemNames),
    name: fromOptional(desired.name),
    ip: pending(),
    status: pending(),
    hostname: pending(),
    jupyterUrl: pending(),
    jupyterToken: pending(),
  };
}

/** A booting instance has no address yet; anywhere else a missing one is gone. */
function projectIp(raw: LambdaRawInstance): Value<string> {
  if (raw.ip) return known(raw.ip);
  return raw.status === "booting" ? pending() : absent();
}

export function projectInstance(raw: LambdaRawInstance, handle: ResourceHandle): InstanceState {
  const fileSystems = raw.file_system_names ?? [];
  return {
    id: known(handle),
    regionName: raw.region.name,
    instanceTypeName: raw.instance_type.name,
    sshKeyNames: [...raw.ssh_key_names],
    fileSystemNames: fileSystems.length > 0 ? known([...fileSystems]) : absent(),
    name: fromRemote(raw.name),
    ip: projectIp(raw),
    status: fromRemote(raw.status),
    hostname: fromRemote(raw.hostname),
    jupyterUrl: fromRemote(raw.jupyter_url),
    jupyterToken: fromRemote(raw.jupyter_token),
  };
}

function buildLaunchRequest(desired: InstanceDesired): LaunchRequest {
  const request: LaunchRequest = {
    region_name: desired.regionName,
    instance_type_name: desired.instanceTypeName,
    ssh_key_names: [...desired.sshKeyNames],
    quantity: 1,
  };
  if (desired.fileSystemNames && desired.fileSystemNames.length > 0) {
    request.file_system_names = [...desired.fileSystemNames];
  }
  if (desired.name !== undefined) request.name = desired.name;
  return request;
}

// =============================================================================
// Controller
// =============================================================================

export class InstanceController implements ResourceController<InstanceDesired, InstanceState> {
  readonly kind = "instance" as const;

  constructor(private readonly client: LambdaClient) {}

  plan(desired: InstanceDesired): InstanceState {
    return planInstance(desired);
  }

  async create(
    desired: InstanceDesired,
    signal?: AbortSignal,
  ): Promise<CreateResult<InstanceState>> {
    validateInstanceDesired(desired);

    const result = await this.client.request(
      "POST",
      "instance-operations/launch",
      LaunchResponseSchema,
      { body: buildLaunchRequest(desired), signal },
    );

    const ids = result.data.instance_ids;
    const [id, ...rest] = ids;
    if (id === undefined || rest.length > 0) {
      throw new ResponseCardinalityError(this.client.provider, 1, ids.length);
    }

    const handle = bindHandle(id);
    console.debug(`[lambda] launched instance ${handle} in ${desired.regionName}`);

    // The launch response carries only the id; address and status arrive on Read.
    return {
      handle,
      state: {
        ...planInstance(desired),
        id: known(handle),
        ip: pending(),
        status: pending(),
      },
    };
  }

  async read(
    target: ResourceHandle | InstanceState,
    signal?: AbortSignal,
  ): Promise<ReadOutcome<InstanceState>> {
    const prior = typeof target === "string" ? undefined : target;
    const handle = typeof target === "string" ? target : requireHandle(target.id, "instance");

    let raw: LambdaRawInstance;
    try {
      const result = await this.client.request(
        "GET",
        `instances/${encodeURIComponent(handle)}`,
        GetInstanceResponseSchema,
        { signal },
      );
      raw = result.data;
    } catch (err) {
      if (isNotFound(err)) {
        console.debug(`[lambda] instance ${handle} no longer exists`);
        return { kind: "absent" };
      }
      throw err;
    }

    const state = projectInstance(raw, handle);
    const drift = prior ? compareFields(prior, state, INSTANCE_IDENTITY_FIELDS) : [];
    if (drift.length > 0) {
      console.debug(
        `[lambda] instance ${handle} drifted: ${drift.map((d) => d.field).join(", ")}`,
      );
    }
    return { kind: "found", state, drift };
  }

  update(prior: InstanceState, desired: InstanceDesired): InstanceState {
    validateInstanceDesired(desired);
    const changed = this.identityChanges(prior, desired);
    if (changed.length > 0) {
      throw requiresReplacement("instance", changed);
    }
    return {
      ...prior,
      name: fromOptional(desired.name),
      fileSystemNames: fromOptional(desired.fileSystemNames),
    };
  }

  async delete(handle: ResourceHandle, signal?: AbortSignal): Promise<DeleteOutcome> {
    try {
      await this.client.request(
        "POST",
        "instance-operations/terminate",
        TerminateResponseSchema,
        { body: { instance_ids: [handle] } satisfies TerminateRequest, signal },
      );
    } catch (err) {
      if (isNotFound(err)) {
        console.debug(`[lambda] instance ${handle} already terminated`);
        return { kind: "already_gone" };
      }
      throw err;
    }
    console.debug(`[lambda] terminated instance ${handle}`);
    return { kind: "deleted" };
  }

  importState(externalId: string): ResourceHandle {
    return bindHandle(externalId);
  }

  identityChanges(prior: InstanceState, desired: InstanceDesired): string[] {
    return compareFields(prior, desired, INSTANCE_IDENTITY_FIELDS).map((d) => d.field);
  }
}
