/**
 * Throws when an internal invariant of the compiler does not hold
 */
export default function assert(
  condition: unknown,
  message?: string,
): asserts condition {
  if (!condition) {
    throw new Error(message || 'Internal invariant violated');
  }
}
