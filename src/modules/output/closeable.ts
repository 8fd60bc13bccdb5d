/**
 * Contract for output objects that hold resources (file handles, readline
 * interfaces) and must be released before they are replaced.
 */

export interface Closeable {
  close(): void
}

export function isCloseable(value: unknown): value is Closeable {
  return (
    typeof value === 'object' &&
    value !== null &&
    'close' in value &&
    typeof value.close === 'function'
  )
}
