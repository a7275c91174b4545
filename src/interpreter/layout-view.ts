// =============================================================================
// Layout View — Builds the resolved render tree from the node arena
// =============================================================================

import type { Logger } from "../logging/logger.js";
import type { BindingResolverPort } from "../ports/binding-resolver.port.js";
import type { ApplicationState, RenderResult, ResolvedNode } from "../types.js";
import type { NodeBuffer } from "./node-buffer.js";

export interface BuildTreeParams {
  buffer: NodeBuffer;
  rootId: string;
  resolver: BindingResolverPort;
  state: ApplicationState;
  logger: Logger;
}

/**
 * Resolves every property against `state` on each call. A child that is not
 * buffered is left out and reported in `missing`; a child that already sits on
 * its own ancestor path is left out so cyclic references terminate.
 */
export function buildTree(params: BuildTreeParams): RenderResult {
  const { buffer, resolver, state, logger } = params;
  const missing = new Set<string>();
  const path = new Set<string>();

  function visit(id: string): ResolvedNode | undefined {
    const node = buffer.get(id);
    if (!node) {
      missing.add(id);
      return undefined;
    }

    path.add(id);
    const children: ResolvedNode[] = [];
    for (const childId of node.children) {
      if (path.has(childId)) {
        logger.warn("render:cycle", { parentId: id, childId });
        continue;
      }
      const child = visit(childId);
      if (child) children.push(child);
    }
    path.delete(id);

    return {
      id: node.id,
      kind: node.kind,
      properties: resolver.resolve(node.properties, state),
      children,
    };
  }

  const tree = visit(params.rootId);
  if (!tree) return { ready: false };

  if (missing.size > 0) {
    logger.debug("render:dangling", { missing: [...missing] });
  }
  return { ready: true, tree, missing: [...missing] };
}
