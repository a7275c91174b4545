import { describe, it, expect } from "vitest";
import { OversizedLine, fromChunks, splitLines } from "../line-splitter.js";

/** Collect all values from an AsyncGenerator into an array. */
async function collect<T>(gen: AsyncIterable<T>): Promise<T[]> {
  const result: T[] = [];
  for await (const v of gen) result.push(v);
  return result;
}

describe("splitLines", () => {
  it("joins lines split across chunks", async () => {
    const lines = await collect(splitLines(fromChunks(["a\nb", "c\n", "d"])));
    expect(lines).toEqual(["a", "bc", "d"]);
  });

  it("strips CRLF terminators", async () => {
    const lines = await collect(splitLines(fromChunks(["x\r\ny\r\n"])));
    expect(lines).toEqual(["x", "y"]);
  });

  it("does not yield an empty remainder after a final newline", async () => {
    const lines = await collect(splitLines(fromChunks(["a\n"])));
    expect(lines).toEqual(["a"]);
  });

  it("yields blank lines as empty strings", async () => {
    const lines = await collect(splitLines(fromChunks(["a\n\nb\n"])));
    expect(lines).toEqual(["a", "", "b"]);
  });

  it("reassembles a multi-byte character split across byte chunks", async () => {
    const chunks = [new Uint8Array([0x61, 0xc3]), new Uint8Array([0xa9, 0x0a])];
    const lines = await collect(splitLines(fromChunks(chunks)));
    expect(lines).toEqual(["aé"]);
  });

  it("yields nothing for an empty source", async () => {
    const lines = await collect(splitLines(fromChunks([])));
    expect(lines).toEqual([]);
  });
});

describe("splitLines — maxLineLength", () => {
  it("drops an overlong line as it streams in and resumes at the next newline", async () => {
    const lines = await collect(splitLines(fromChunks(["abcdef", "ghi", "jk\nok\n"]), { maxLineLength: 4 }));
    expect(lines).toEqual([new OversizedLine(11), "ok"]);
    expect(lines[0]).toBeInstanceOf(OversizedLine);
  });

  it("marks a complete overlong line delivered in one chunk", async () => {
    const lines = await collect(splitLines(fromChunks(["abcdef\nxy\n"]), { maxLineLength: 3 }));
    expect(lines).toEqual([new OversizedLine(6), "xy"]);
  });

  it("keeps a line at the limit whose CRLF arrives in a later chunk", async () => {
    const lines = await collect(splitLines(fromChunks(["abc\r", "\n"]), { maxLineLength: 3 }));
    expect(lines).toEqual(["abc"]);
  });

  it("reports an overlong unterminated tail once the source ends", async () => {
    const lines = await collect(splitLines(fromChunks(["abcd", "ef"]), { maxLineLength: 2 }));
    expect(lines).toEqual([new OversizedLine(6)]);
  });
});
