// provider/types.ts - Controller Interface & Lambda API Shapes

import { Type, type Static, type TString } from "@sinclair/typebox";
import type {
  ProviderName,
  ResourceKind,
  ResourceHandle,
  CreateResult,
  ReadOutcome,
  DeleteOutcome,
} from "@gpuform/contracts";

export type { ProviderName };

// =============================================================================
// Controller Interface
// =============================================================================

/**
 * Lifecycle operations for one resource kind. `D` is the desired record,
 * `S` the full state record (desired fields plus observed ones) that the
 * host persists between calls.
 *
 * Every network operation accepts an AbortSignal; an abort rejects with a
 * TransportError and leaves nothing half-done locally, because controllers
 * keep no state of their own.
 */
export interface ResourceController<D, S> {
  readonly kind: ResourceKind;

  /** Record a host shows before Create: computed fields pending */
  plan(desired: D): S;
  create(desired: D, signal?: AbortSignal): Promise<CreateResult<S>>;
  read(target: ResourceHandle | S, signal?: AbortSignal): Promise<ReadOutcome<S>>;
  /** No remote mutation; identity changes are rejected */
  update(prior: S, desired: D): S;
  delete(handle: ResourceHandle, signal?: AbortSignal): Promise<DeleteOutcome>;
  importState(externalId: string): ResourceHandle;
  /** Identity fields that differ; non-empty means the host must replace */
  identityChanges(prior: S, desired: D): string[];
}

// =============================================================================
// Raw API Schemas (Lambda Cloud API v1)
// =============================================================================

const Nullable = (schema: TString) =>
  Type.Optional(Type.Union([schema, Type.Null()]));

/** Body of every non-2xx response */
export const LambdaErrorEnvelopeSchema = Type.Object({
  error: Type.Object({
    code: Type.String(),
    message: Type.String(),
    suggestion: Nullable(Type.String()),
  }),
});

export const LambdaRawInstanceSchema = Type.Object({
  id: Type.String(),
  name: Nullable(Type.String()),
  ip: Nullable(Type.String()),
  status: Type.String(),
  ssh_key_names: Type.Array(Type.String()),
  file_system_names: Type.Optional(Type.Array(Type.String())),
  region: Type.Object({
    name: Type.String(),
    description: Type.Optional(Type.String()),
  }),
  instance_type: Type.Object({
    name: Type.String(),
    description: Type.Optional(Type.String()),
    price_cents_per_hour: Type.Optional(Type.Number()),
  }),
  hostname: Nullable(Type.String()),
  jupyter_token: Nullable(Type.String()),
  jupyter_url: Nullable(Type.String()),
});

export type LambdaRawInstance = Static<typeof LambdaRawInstanceSchema>;

export const LaunchResponseSchema = Type.Object({
  data: Type.Object({
    instance_ids: Type.Array(Type.String()),
  }),
});

export const GetInstanceResponseSchema = Type.Object({
  data: LambdaRawInstanceSchema,
});

export const TerminateResponseSchema = Type.Object({
  data: Type.Object({
    terminated_instances: Type.Array(Type.Object({ id: Type.String() })),
  }),
});

export const LambdaRawSshKeySchema = Type.Object({
  id: Type.String(),
  name: Type.String(),
  public_key: Type.String(),
  private_key: Nullable(Type.String()),
});

export type LambdaRawSshKey = Static<typeof LambdaRawSshKeySchema>;

export const CreateSshKeyResponseSchema = Type.Object({
  data: LambdaRawSshKeySchema,
});

export const ListSshKeysResponseSchema = Type.Object({
  data: Type.Array(LambdaRawSshKeySchema),
});

// =============================================================================
// Request Bodies
// =============================================================================

export interface LaunchRequest {
  region_name: string;
  instance_type_name: string;
  ssh_key_names: string[];
  file_system_names?: string[];
  name?: string;
  quantity: 1;
}

export interface TerminateRequest {
  instance_ids: string[];
}

export interface CreateSshKeyRequest {
  name: string;
  public_key?: string;
}
