// =============================================================================
// NodeBuffer — Flat id → LayoutNode arena, filled out of order
// =============================================================================

import type { LayoutNode } from "../types.js";

export interface WalkResult {
  /** Buffered nodes reachable from the root, in depth-first pre-order. */
  readonly nodes: readonly LayoutNode[];
  /** Reachable ids with no buffered node, in discovery order. */
  readonly missing: readonly string[];
}

export class NodeBuffer {
  private readonly nodes = new Map<string, LayoutNode>();

  /** Insert or overwrite. Returns true when an existing node was replaced. */
  put(node: LayoutNode): boolean {
    const replaced = this.nodes.has(node.id);
    this.nodes.set(
      node.id,
      Object.freeze({
        id: node.id,
        kind: node.kind,
        properties: Object.freeze({ ...node.properties }),
        children: Object.freeze([...node.children]),
      }),
    );
    return replaced;
  }

  get(id: string): LayoutNode | undefined {
    return this.nodes.get(id);
  }

  has(id: string): boolean {
    return this.nodes.has(id);
  }

  get size(): number {
    return this.nodes.size;
  }

  ids(): string[] {
    return [...this.nodes.keys()];
  }

  /** Visits each reachable id once, so shared children and cycles terminate. */
  walk(rootId: string): WalkResult {
    const nodes: LayoutNode[] = [];
    const missing: string[] = [];
    const seen = new Set<string>();
    const stack: string[] = [rootId];

    while (stack.length > 0) {
      const id = stack.pop();
      if (id === undefined || seen.has(id)) continue;
      seen.add(id);

      const node = this.nodes.get(id);
      if (!node) {
        missing.push(id);
        continue;
      }
      nodes.push(node);
      for (let i = node.children.length - 1; i >= 0; i--) {
        const child = node.children[i];
        if (child !== undefined && !seen.has(child)) stack.push(child);
      }
    }

    return { nodes, missing };
  }
}
