// provider/resources/ssh-key.ts - Lambda SSH key controller

import {
  ValidationError,
  SSH_KEY_IDENTITY_FIELDS,
  absent,
  pending,
  known,
  fromRemote,
  bindHandle,
  type SshKeyDesired,
  type SshKeyState,
  type ResourceHandle,
  type CreateResult,
  type ReadOutcome,
  type DeleteOutcome,
} from "@gpuform/contracts";
import type { LambdaClient } from "../client";
import { isNotFound } from "../errors";
import { findById } from "../match";
import {
  CreateSshKeyResponseSchema,
  ListSshKeysResponseSchema,
  type CreateSshKeyRequest,
  type LambdaRawSshKey,
  type ResourceController,
} from "../types";
import { compareFields, requireHandle, requiresReplacement } from "./identity";

/**
 * Without a public key the service generates the pair and returns the
 * private half once, in the create response.
 */
export function planSshKey(desired: SshKeyDesired): SshKeyState {
  if (desired.publicKey === undefined) {
    return { id: pending(), name: desired.name, publicKey: pending(), privateKey: pending() };
  }
  return {
    id: pending(),
    name: desired.name,
    publicKey: known(desired.publicKey),
    privateKey: absent(),
  };
}

export function projectSshKey(raw: LambdaRawSshKey, handle: ResourceHandle): SshKeyState {
  return {
    id: known(handle),
    name: raw.name,
    publicKey: fromRemote(raw.public_key),
    privateKey: fromRemote(raw.private_key),
  };
}

export class SshKeyController implements ResourceController<SshKeyDesired, SshKeyState> {
  readonly kind = "ssh_key" as const;

  constructor(private readonly client: LambdaClient) {}

  plan(desired: SshKeyDesired): SshKeyState {
    return planSshKey(desired);
  }

  async create(desired: SshKeyDesired, signal?: AbortSignal): Promise<CreateResult<SshKeyState>> {
    if (!desired.name) {
      throw new ValidationError("name must not be empty", { code: "INVALID_INPUT" });
    }

    const body: CreateSshKeyRequest = { name: desired.name };
    if (desired.publicKey !== undefined) body.public_key = desired.publicKey;

    const result = await this.client.request("POST", "ssh-keys", CreateSshKeyResponseSchema, {
      body,
      signal,
    });

    const handle = bindHandle(result.data.id);
    console.debug(`[lambda] created ssh key ${handle} (${result.data.name})`);
    return { handle, state: projectSshKey(result.data, handle) };
  }

  async read(
    target: ResourceHandle | SshKeyState,
    signal?: AbortSignal,
  ): Promise<ReadOutcome<SshKeyState>> {
    const prior = typeof target === "string" ? undefined : target;
    const handle = typeof target === "string" ? target : requireHandle(target.id, "ssh key");

    // No by-id endpoint: list and scan. A 404 on the listing reads as absent.
    let listed: LambdaRawSshKey[];
    try {
      const result = await this.client.request("GET", "ssh-keys", ListSshKeysResponseSchema, {
        signal,
      });
      listed = result.data;
    } catch (err) {
      if (!isNotFound(err)) throw err;
      listed = [];
    }

    const raw = findById(listed, handle);
    if (!raw) {
      console.debug(`[lambda] ssh key ${handle} no longer exists`);
      return { kind: "absent" };
    }

    const state = projectSshKey(raw, handle);
    const drift = prior ? compareFields(prior, state, SSH_KEY_IDENTITY_FIELDS) : [];
    return { kind: "found", state, drift };
  }

  update(prior: SshKeyState, desired: SshKeyDesired): SshKeyState {
    const changed = this.identityChanges(prior, desired);
    if (changed.length > 0) {
      throw requiresReplacement("ssh key", changed);
    }
    return {
      ...prior,
      publicKey: desired.publicKey !== undefined ? known(desired.publicKey) : prior.publicKey,
    };
  }

  async delete(handle: ResourceHandle, signal?: AbortSignal): Promise<DeleteOutcome> {
    try {
      await this.client.send("DELETE", `ssh-keys/${encodeURIComponent(handle)}`, { signal });
    } catch (err) {
      if (isNotFound(err)) {
        console.debug(`[lambda] ssh key ${handle} already deleted`);
        return { kind: "already_gone" };
      }
      throw err;
    }
    console.debug(`[lambda] deleted ssh key ${handle}`);
    return { kind: "deleted" };
  }

  importState(externalId: string): ResourceHandle {
    return bindHandle(externalId);
  }

  identityChanges(prior: SshKeyState, desired: SshKeyDesired): string[] {
    return compareFields(prior, desired, SSH_KEY_IDENTITY_FIELDS).map((d) => d.field);
  }
}
