// types.ts - Cross-cutting Primitives and Utilities

import { ValidationError } from './errors';

// =============================================================================
// PRIMITIVES
// =============================================================================

/** Provider that owns the remote objects */
export type ProviderName = 'lambda';

/** Resource kinds managed by the reconciliation core */
export type ResourceKind = 'instance' | 'ssh_key';

declare const handleBrand: unique symbol;

/**
 * Opaque identifier correlating a desired record with its remote object.
 * Bound once from a remote response or an import; never regenerated.
 */
export type ResourceHandle = string & { readonly [handleBrand]: true };

/** Bind a handle from a remote identifier */
export function bindHandle(id: string): ResourceHandle {
  if (id.length === 0) {
    throw new ValidationError('Resource identifier must not be empty', {
      code: 'INVALID_INPUT',
    });
  }
  return id as ResourceHandle;
}

// =============================================================================
// TRI-STATE VALUES
// =============================================================================

// "absent": nobody set it and the server will not compute it.
// "pending": the server will compute it on the next exchange.
// "known": a concrete value read from the caller or the remote service.
export type Value<T> =
  | { readonly kind: 'absent' }
  | { readonly kind: 'pending' }
  | { readonly kind: 'known'; readonly value: T };

const ABSENT = Object.freeze({ kind: 'absent' as const });
const PENDING = Object.freeze({ kind: 'pending' as const });

export function absent<T = never>(): Value<T> {
  return ABSENT;
}

export function pending<T = never>(): Value<T> {
  return PENDING;
}

export function known<T>(value: T): Value<T> {
  return { kind: 'known', value };
}

export function isKnown<T>(v: Value<T>): v is { readonly kind: 'known'; readonly value: T } {
  return v.kind === 'known';
}

/** Unwrap a known value, or return the fallback for absent/pending */
export function valueOr<T, F>(v: Value<T>, fallback: F): T | F {
  return v.kind === 'known' ? v.value : fallback;
}

/** Lift an optional caller-supplied field: undefined means "not set" */
export function fromOptional<T>(v: T | undefined): Value<T> {
  return v === undefined ? absent() : known(v);
}

/**
 * Lift a remote field. Null, undefined and empty strings are "absent":
 * the service does not send placeholders, so an empty value carries nothing.
 */
export function fromRemote(v: string | null | undefined): Value<string> {
  return v === null || v === undefined || v === '' ? absent() : known(v);
}
