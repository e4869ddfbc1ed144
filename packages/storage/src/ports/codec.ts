/**
 * Bidirectional transform between a typed value and bytes.
 *
 * Codecs are pure: no I/O, no state between calls.
 */
export interface Codec<T> {
  encode(value: T): Uint8Array

  decode(bytes: Uint8Array): T
}
