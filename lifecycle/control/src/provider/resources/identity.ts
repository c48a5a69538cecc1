// provider/resources/identity.ts - Identity field comparison

import {
  ValidationError,
  isKnown,
  type DriftEntry,
  type ResourceHandle,
  type Value,
} from "@gpuform/contracts";

// Key lists are sets: order carries no meaning to the service.
function sameField(a: unknown, b: unknown): boolean {
  if (Array.isArray(a) && Array.isArray(b)) {
    if (a.length !== b.length) return false;
    const left = [...a].map(String).sort();
    const right = [...b].map(String).sort();
    return left.every((v, i) => v === right[i]);
  }
  return a === b;
}

/** Fields whose value in `expected` differs from `actual` */
export function compareFields<A, B>(
  expected: A,
  actual: B,
  fields: readonly (keyof A & keyof B & string)[],
): DriftEntry[] {
  const drift: DriftEntry[] = [];
  for (const field of fields) {
    if (!sameField(expected[field], actual[field])) {
      drift.push({ field, expected: expected[field], actual: actual[field] });
    }
  }
  return drift;
}

export function requireHandle(id: Value<ResourceHandle>, what: string): ResourceHandle {
  if (!isKnown(id)) {
    throw new ValidationError(`${what} has no bound identifier; create or import it first`, {
      code: "INVALID_INPUT",
    });
  }
  return id.value;
}

export function requiresReplacement(what: string, fields: string[]): ValidationError {
  return new ValidationError(
    `Changing ${fields.join(", ")} requires replacing the ${what}`,
    { code: "REQUIRES_REPLACEMENT", details: { fields } },
  );
}
