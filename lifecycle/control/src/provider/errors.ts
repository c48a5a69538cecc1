// provider/errors.ts - Provider Error Taxonomy & Response Classifier
//
// Every remote exchange ends in exactly one of: a decoded body, NotFoundError
// (404, which Read/Delete turn into absent/already_gone), RemoteError (any
// other non-2xx with a readable envelope), DecodeError (unreadable body), or
// TransportError (the request never completed).

import type { Static, TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { GpuformError, type ErrorCategory } from "@gpuform/contracts";
import type { ProviderName } from "./types";
import { LambdaErrorEnvelopeSchema } from "./types";

// =============================================================================
// Base Error Class
// =============================================================================

export abstract class ProviderOperationError extends GpuformError {
  /** Nothing in this layer retries; the flag is informational for the host */
  readonly retryable = false;

  constructor(
    code: string,
    message: string,
    category: ErrorCategory,
    public readonly provider: ProviderName,
    options?: { details?: Record<string, unknown>; cause?: unknown },
  ) {
    super(code, message, category, options);
    this.name = this.constructor.name;
  }
}

// =============================================================================
// Specific Error Classes
// =============================================================================

/** The request did not complete: DNS, refused connection, abort */
export class TransportError extends ProviderOperationError {
  constructor(
    provider: ProviderName,
    message: string,
    public readonly aborted: boolean,
    cause?: unknown,
  ) {
    super(aborted ? "ABORTED" : "NETWORK_ERROR", message, "transport", provider, {
      cause,
    });
  }
}

export class DecodeError extends ProviderOperationError {
  constructor(
    provider: ProviderName,
    public readonly status: number,
    reason: string,
  ) {
    super(
      "DECODE_ERROR",
      `Unreadable response (HTTP ${status}): ${reason}`,
      "decode",
      provider,
      { details: { status } },
    );
  }
}

/**
 * Non-2xx response carrying the service's error envelope. `message` is the
 * service's own text, unmodified.
 */
export class RemoteError extends ProviderOperationError {
  constructor(
    provider: ProviderName,
    public readonly status: number,
    public readonly remoteCode: string,
    message: string,
    public readonly suggestion?: string,
  ) {
    super(remoteCode, message, "remote", provider, {
      details: { status, suggestion },
    });
  }
}

export class NotFoundError extends ProviderOperationError {
  constructor(
    provider: ProviderName,
    message: string,
    public readonly remoteCode?: string,
  ) {
    super("NOT_FOUND", message, "not_found", provider, {
      details: { status: 404, remoteCode },
    });
  }
}

/** A single-resource request came back with some other number of ids */
export class ResponseCardinalityError extends ProviderOperationError {
  constructor(
    provider: ProviderName,
    public readonly expected: number,
    public readonly actual: number,
  ) {
    super(
      "RESPONSE_CARDINALITY",
      `expected ${expected} response got ${actual}`,
      "cardinality",
      provider,
      { details: { expected, actual } },
    );
  }
}

// =============================================================================
// Classification
// =============================================================================

export const HTTP_NOT_FOUND = 404;

export function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300;
}

type Parsed = { ok: true; value: unknown } | { ok: false; reason: string };

function parseJson(text: string): Parsed {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (err) {
    return { ok: false, reason: err instanceof Error ? err.message : String(err) };
  }
}

function firstSchemaError(schema: TSchema, value: unknown): string {
  const first = Value.Errors(schema, value).First();
  if (!first) return "does not match the expected shape";
  return `${first.path || "/"}: ${first.message}`;
}

/**
 * Map a non-2xx status and its raw body to the taxonomy.
 * 404 is always NotFoundError, whether or not the body is readable.
 */
export function mapLambdaError(
  provider: ProviderName,
  status: number,
  text: string,
): ProviderOperationError {
  const parsed = parseJson(text);
  const body = parsed.ok ? parsed.value : undefined;
  const envelope = Value.Check(LambdaErrorEnvelopeSchema, body) ? body.error : undefined;

  if (status === HTTP_NOT_FOUND) {
    return new NotFoundError(provider, envelope?.message ?? `HTTP ${status}`, envelope?.code);
  }
  if (!parsed.ok) {
    return new DecodeError(provider, status, parsed.reason);
  }
  if (!envelope) {
    return new DecodeError(
      provider,
      status,
      `error envelope ${firstSchemaError(LambdaErrorEnvelopeSchema, body)}`,
    );
  }
  return new RemoteError(
    provider,
    status,
    envelope.code,
    envelope.message,
    envelope.suggestion ?? undefined,
  );
}

/**
 * Classify a completed exchange. Returns the decoded 2xx body, throws the
 * mapped error otherwise.
 */
export function classifyResponse<T extends TSchema>(
  provider: ProviderName,
  status: number,
  text: string,
  schema: T,
): Static<T> {
  if (!isSuccessStatus(status)) {
    throw mapLambdaError(provider, status, text);
  }

  const parsed = parseJson(text);
  if (!parsed.ok) {
    throw new DecodeError(provider, status, parsed.reason);
  }
  const body = parsed.value;
  if (!Value.Check(schema, body)) {
    throw new DecodeError(provider, status, firstSchemaError(schema, body));
  }
  return body;
}

/** Wrap a rejected fetch */
export function classifyTransportFailure(
  provider: ProviderName,
  error: unknown,
  signal?: AbortSignal,
): TransportError {
  const aborted =
    signal?.aborted === true ||
    (error instanceof Error && (error.name === "AbortError" || error.name === "TimeoutError"));
  const message = error instanceof Error ? error.message : String(error);
  return new TransportError(
    provider,
    aborted ? `Request aborted: ${message}` : `Request failed: ${message}`,
    aborted,
    error,
  );
}

// =============================================================================
// Error Handling Helpers
// =============================================================================

/**
 * Wrap an async provider operation: taxonomy errors pass through untouched,
 * anything else becomes a TransportError so the host sees one error family.
 */
export async function withProviderErrorMapping<T>(
  provider: ProviderName,
  fn: () => Promise<T>,
): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    if (error instanceof GpuformError) throw error;
    throw classifyTransportFailure(provider, error);
  }
}

export function isNotFound(error: unknown): error is NotFoundError {
  return error instanceof NotFoundError;
}
