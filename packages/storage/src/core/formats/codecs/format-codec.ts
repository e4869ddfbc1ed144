import type { Codec } from "../../../ports/codec"
import type { Format } from "../format"

export interface FormatCodec<T> extends Codec<T> {
  readonly format: Format

  /** Content type written when neither the caller nor the key suffix decides. */
  readonly contentType: string

  /** Whether `value` can be encoded by this codec. */
  accepts(value: unknown): value is T
}
