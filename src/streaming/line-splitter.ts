// =============================================================================
// Line Splitter — Yields complete lines from a chunked text or byte stream
// =============================================================================

export type StreamChunk = string | Uint8Array;

/** Stands in for a line that exceeded `maxLineLength`; its text is not kept. */
export class OversizedLine {
  declare private readonly brand: never;
  constructor(readonly length: number) {}
}

export function isOversizedLine(value: unknown): value is OversizedLine {
  return value instanceof OversizedLine;
}

export interface SplitLinesOptions {
  /** Longest line kept in memory, in UTF-16 code units. Default: unbounded. */
  maxLineLength?: number;
}

/**
 * Takes an AsyncIterable of chunks (e.g. a file read stream, stdin, a fetch
 * body) and yields each `\n`-terminated line without its terminator. A
 * trailing `\r` is stripped. Bytes are decoded as UTF-8 in streaming mode so a
 * character split across chunks comes out whole. The last line is yielded even
 * without a final newline.
 *
 * With `maxLineLength`, a line that grows past the limit is dropped as it
 * arrives (up to its `\n`) and yielded as a single {@link OversizedLine}.
 */
export async function* splitLines(
  source: AsyncIterable<StreamChunk>,
  options: SplitLinesOptions = {},
): AsyncGenerator<string | OversizedLine> {
  const maxLineLength = options.maxLineLength ?? Number.POSITIVE_INFINITY;
  const decoder = new TextDecoder("utf-8");
  const toLine = (raw: string): string | OversizedLine => {
    const line = stripCarriageReturn(raw);
    return line.length > maxLineLength ? new OversizedLine(line.length) : line;
  };

  let pending = "";
  // Characters dropped so far from an oversized line still waiting for its `\n`.
  let dropped = 0;

  for await (const chunk of source) {
    let text = typeof chunk === "string" ? chunk : decoder.decode(chunk, { stream: true });

    if (dropped > 0) {
      const newline = text.indexOf("\n");
      if (newline === -1) {
        dropped += text.length;
        continue;
      }
      yield new OversizedLine(dropped + newline);
      dropped = 0;
      text = text.slice(newline + 1);
    }

    pending += text;
    let newline = pending.indexOf("\n");
    while (newline !== -1) {
      yield toLine(pending.slice(0, newline));
      pending = pending.slice(newline + 1);
      newline = pending.indexOf("\n");
    }

    // One extra unit leaves room for a `\r` before the newline.
    if (pending.length > maxLineLength + 1) {
      dropped = pending.length;
      pending = "";
    }
  }

  pending += decoder.decode();
  if (dropped > 0) yield new OversizedLine(dropped + pending.length);
  else if (pending.length > 0) yield toLine(pending);
}

function stripCarriageReturn(line: string): string {
  return line.endsWith("\r") ? line.slice(0, -1) : line;
}

/** Turn an array of chunks into an async iterable. */
export async function* fromChunks(chunks: Iterable<StreamChunk>): AsyncGenerator<StreamChunk> {
  for (const chunk of chunks) yield chunk;
}
