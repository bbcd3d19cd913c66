/**
 * Terminal branch of an exhaustive switch. The compiler rejects callers
 * whose switch misses a member; values that reach it at runtime (a number
 * cast into an enum, for instance) throw.
 */
export function assertNever(value: never, what: string): never {
  throw new Error(`Unhandled ${what}: ${String(value)}`);
}
