/**
 * @file src/core/ids.ts
 * @summary Unique ID generator for cards, reviews and due dates. Produces random RFC 4122
 * version-4 UUIDs from the platform's secure random source and, where a collision check is
 * wanted, retries against the caller's set of used ids.
 *
 * @exports
 *   - generateId — generate a random UUID string
 *   - generateUniqueId — generate a UUID for which `isTaken` returns false
 */

export function generateId(): string {
  const cryptoObj = globalThis.crypto;
  if (!cryptoObj?.randomUUID) {
    throw new Error("Secure random generator unavailable.");
  }
  return cryptoObj.randomUUID();
}

export function generateUniqueId(isTaken: (id: string) => boolean): string {
  for (let i = 0; i < 100; i++) {
    const id = generateId();
    if (!isTaken(id)) return id;
  }
  throw new Error("Unable to generate a unique ID after many attempts.");
}
