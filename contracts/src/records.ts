// records.ts - Desired / Observed State Records and Lifecycle Outcomes

import type { ResourceHandle, Value } from './types';

// =============================================================================
// INSTANCE
// =============================================================================

/** What the caller wants to hold true for a compute instance */
export interface InstanceDesired {
  regionName: string;
  instanceTypeName: string;
  /** Exactly one key name is accepted by the service today */
  sshKeyNames: string[];
  /** At most one file system */
  fileSystemNames?: string[];
  name?: string;
}

/** Desired fields plus everything learned from the remote service */
export interface InstanceState {
  id: Value<ResourceHandle>;
  regionName: string;
  instanceTypeName: string;
  sshKeyNames: string[];
  fileSystemNames: Value<string[]>;
  name: Value<string>;
  ip: Value<string>;
  status: Value<string>;
  hostname: Value<string>;
  jupyterUrl: Value<string>;
  jupyterToken: Value<string>;
}

/** Fields whose change requires a new remote object */
export const INSTANCE_IDENTITY_FIELDS = [
  'regionName',
  'instanceTypeName',
  'sshKeyNames',
] as const satisfies readonly (keyof InstanceDesired & keyof InstanceState)[];

// =============================================================================
// SSH KEY
// =============================================================================

export interface SshKeyDesired {
  name: string;
  /** Omit to have the service generate a key pair */
  publicKey?: string;
}

export interface SshKeyState {
  id: Value<ResourceHandle>;
  name: string;
  publicKey: Value<string>;
  /** Only ever returned by the service when it generates the pair */
  privateKey: Value<string>;
}

export const SSH_KEY_IDENTITY_FIELDS = [
  'name',
] as const satisfies readonly (keyof SshKeyDesired & keyof SshKeyState)[];

// =============================================================================
// OUTCOMES
// =============================================================================

export interface CreateResult<S> {
  handle: ResourceHandle;
  state: S;
}

/** Identity field whose remembered value disagreed with remote truth */
export interface DriftEntry {
  field: string;
  expected: unknown;
  actual: unknown;
}

export type ReadOutcome<S> =
  | { kind: 'found'; state: S; drift: DriftEntry[] }
  // The remote object is gone: the caller drops its local record.
  | { kind: 'absent' };

export type DeleteOutcome =
  | { kind: 'deleted' }
  | { kind: 'already_gone' };
