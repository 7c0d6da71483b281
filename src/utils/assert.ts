/**
 * Internal invariant check. A failure here is a defect in this library,
 * not a caller mistake.
 */
export default function assert(
  condition: unknown,
  message?: string,
): asserts condition {
  if (!condition) {
    throw new Error(`Invariant violated: ${message || 'assertion failed'}`);
  }
}
