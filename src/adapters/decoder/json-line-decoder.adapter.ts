// =============================================================================
// JsonLineDecoder — Zod-based implementation of MessageDecoderPort
// =============================================================================

import type { ZodError } from "zod";
import {
  MessageEnvelopeSchema,
  StreamMessageSchema,
  isMessageKind,
  type StreamMessage,
} from "../../domain/stream-message.schema.js";
import { MalformedMessageError, UnknownMessageKindError } from "../../errors.js";
import type { DecodeResult, MessageDecoderPort } from "../../ports/message-decoder.port.js";

export interface JsonLineDecoderOptions {
  /** Lines longer than this (in UTF-16 code units) are rejected unparsed. Default: 1 MiB. */
  maxLineLength?: number;
}

export const DEFAULT_MAX_LINE_LENGTH = 1024 * 1024;

function formatIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${path}: ${issue.message}`;
  });
}

/** Error for a line longer than `maxLineLength` UTF-16 code units. */
export function lineTooLongError(maxLineLength: number): MalformedMessageError {
  return new MalformedMessageError(`Line exceeds ${maxLineLength} characters`);
}

export class JsonLineDecoder implements MessageDecoderPort {
  private readonly maxLineLength: number;

  constructor(options?: JsonLineDecoderOptions) {
    this.maxLineLength = options?.maxLineLength ?? DEFAULT_MAX_LINE_LENGTH;
  }

  decode(line: string): DecodeResult {
    if (line.length > this.maxLineLength) {
      return this.fail(lineTooLongError(this.maxLineLength));
    }

    let raw: unknown;
    try {
      raw = JSON.parse(line);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      return this.fail(new MalformedMessageError("Invalid JSON", [reason]));
    }

    if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
      return this.fail(new MalformedMessageError("Message must be a JSON object"));
    }

    const envelope = MessageEnvelopeSchema.safeParse(raw);
    if (!envelope.success) {
      return this.fail(
        new MalformedMessageError("Message lacks a string \"type\" discriminator"),
      );
    }

    const kind = envelope.data.type;
    if (!isMessageKind(kind)) {
      return this.fail(new UnknownMessageKindError(kind));
    }

    const parsed = StreamMessageSchema.safeParse(raw);
    if (!parsed.success) {
      return this.fail(
        new MalformedMessageError(`Invalid "${kind}" message`, formatIssues(parsed.error)),
      );
    }
    return { success: true, message: parsed.data };
  }

  /** Same as `decode()` but throws the decode error. */
  decodeOrThrow(line: string): StreamMessage {
    const result = this.decode(line);
    if (!result.success) throw result.error;
    return result.message;
  }

  private fail(error: MalformedMessageError | UnknownMessageKindError): DecodeResult {
    return { success: false, error };
  }
}
