// =============================================================================
// MessageDecoderPort — Contract for turning one stream line into a message
// =============================================================================

import type { StreamMessage } from "../domain/stream-message.schema.js";
import type { MalformedMessageError, UnknownMessageKindError } from "../errors.js";

export type DecodeError = MalformedMessageError | UnknownMessageKindError;

export type DecodeResult =
  | { readonly success: true; readonly message: StreamMessage }
  | { readonly success: false; readonly error: DecodeError };

export interface MessageDecoderPort {
  /** Decode a single line. Pure: no state carried between calls. */
  decode(line: string): DecodeResult;
}
