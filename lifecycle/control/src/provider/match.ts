// provider/match.ts - Find a remote record in a listing
//
// The service lists some kinds without a by-id lookup. Listings belong to a
// single account and stay small, so a linear scan is enough. When ids repeat,
// the first record in listing order wins.

export function findById<T extends { id: string }>(
  records: readonly T[],
  id: string,
): T | undefined {
  for (const record of records) {
    if (record.id === id) return record;
  }
  return undefined;
}
