import { describe, it, expect } from "vitest";
import { NodeBuffer } from "../node-buffer.js";
import { ReadinessTracker } from "../readiness-tracker.js";

function node(id: string, children: string[] = []) {
  return { id, kind: "Box", properties: {}, children };
}

describe("NodeBuffer", () => {
  it("stores nodes that arrive before their parent", () => {
    const buffer = new NodeBuffer();
    buffer.put(node("child"));
    expect(buffer.has("child")).toBe(true);
    expect(buffer.has("parent")).toBe(false);
    expect(buffer.size).toBe(1);
  });

  it("reports overwrites and keeps the newest node", () => {
    const buffer = new NodeBuffer();
    expect(buffer.put(node("a"))).toBe(false);
    expect(buffer.put({ id: "a", kind: "Text", properties: { text: "x" }, children: [] })).toBe(true);
    expect(buffer.get("a")?.kind).toBe("Text");
    expect(Object.isFrozen(buffer.get("a"))).toBe(true);
  });

  it("walks depth-first and lists missing ids", () => {
    const buffer = new NodeBuffer();
    buffer.put(node("a", ["b", "c"]));
    buffer.put(node("b", ["d"]));
    buffer.put(node("c"));

    const { nodes, missing } = buffer.walk("a");
    expect(nodes.map((n) => n.id)).toEqual(["a", "b", "c"]);
    expect(missing).toEqual(["d"]);
  });

  it("visits shared children once and terminates on cycles", () => {
    const buffer = new NodeBuffer();
    buffer.put(node("a", ["b", "shared"]));
    buffer.put(node("b", ["shared", "a"]));
    buffer.put(node("shared"));

    const { nodes, missing } = buffer.walk("a");
    expect(nodes.map((n) => n.id)).toEqual(["a", "b", "shared"]);
    expect(missing).toEqual([]);
  });

  it("reports an absent root as missing", () => {
    expect(new NodeBuffer().walk("r")).toEqual({ nodes: [], missing: ["r"] });
  });
});

describe("ReadinessTracker", () => {
  it("stays not ready until a root is declared", () => {
    const buffer = new NodeBuffer();
    buffer.put(node("r"));
    const tracker = new ReadinessTracker();
    expect(tracker.evaluate(buffer)).toBeUndefined();
    expect(tracker.isReady).toBe(false);
    expect(tracker.missing(buffer)).toEqual([]);
  });

  it("becomes ready once the root subtree is complete, exactly once", () => {
    const buffer = new NodeBuffer();
    const tracker = new ReadinessTracker();
    tracker.declare("r");

    expect(tracker.evaluate(buffer)).toBeUndefined();
    expect(tracker.missing(buffer)).toEqual(["r"]);

    buffer.put(node("r", ["c"]));
    expect(tracker.evaluate(buffer)).toBeUndefined();
    expect(tracker.missing(buffer)).toEqual(["c"]);

    buffer.put(node("c"));
    expect(tracker.evaluate(buffer)).toEqual({ kind: "ready", rootId: "r" });
    expect(tracker.evaluate(buffer)).toBeUndefined();
    expect(tracker.renderedRootId).toBe("r");
  });

  it("keeps the rendered root while a new root is pending", () => {
    const buffer = new NodeBuffer();
    const tracker = new ReadinessTracker();
    tracker.declare("r1");
    buffer.put(node("r1"));
    tracker.evaluate(buffer);

    tracker.declare("r2");
    expect(tracker.evaluate(buffer)).toBeUndefined();
    expect(tracker.isReady).toBe(true);
    expect(tracker.renderedRootId).toBe("r1");
    expect(tracker.pendingRootId).toBe("r2");

    buffer.put(node("r2"));
    expect(tracker.evaluate(buffer)).toEqual({ kind: "root", rootId: "r2", previousRootId: "r1" });
    expect(tracker.pendingRootId).toBeUndefined();
  });

  it("never reverts once ready", () => {
    const buffer = new NodeBuffer();
    const tracker = new ReadinessTracker();
    tracker.declare("r");
    buffer.put(node("r"));
    tracker.evaluate(buffer);

    buffer.put(node("r", ["not-yet"]));
    expect(tracker.evaluate(buffer)).toBeUndefined();
    expect(tracker.isReady).toBe(true);
  });
});
