/** Drops keys whose value is undefined, the way Drizzle's `set()` ignores them. */
export function compact<T extends object>(input: T): Partial<T> {
  const out: Partial<T> = {};
  for (const key in input) {
    if (input[key] !== undefined) out[key] = input[key];
  }
  return out;
}
