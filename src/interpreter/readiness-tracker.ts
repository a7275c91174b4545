// =============================================================================
// ReadinessTracker — Sticky ready-to-render gate over the node buffer
// =============================================================================

import type { NodeBuffer } from "./node-buffer.js";

export type ReadinessTransition =
  | { readonly kind: "ready"; readonly rootId: string }
  | { readonly kind: "root"; readonly rootId: string; readonly previousRootId: string };

/**
 * Ready once a root is declared and it, with everything reachable from it, is
 * buffered. Never reverts. A root declared after that stays pending until its
 * own subtree is complete, then replaces the rendered root.
 */
export class ReadinessTracker {
  private declared: string | undefined;
  private rendered: string | undefined;

  get isReady(): boolean {
    return this.rendered !== undefined;
  }

  /** Root that `render()` uses; undefined before readiness. */
  get renderedRootId(): string | undefined {
    return this.rendered;
  }

  get declaredRootId(): string | undefined {
    return this.declared;
  }

  /** Root declared after readiness whose subtree is still incomplete. */
  get pendingRootId(): string | undefined {
    return this.rendered !== undefined && this.declared !== this.rendered ? this.declared : undefined;
  }

  declare(rootId: string): void {
    this.declared = rootId;
  }

  /** Ids still needed before the declared root can be rendered. */
  missing(buffer: NodeBuffer): string[] {
    if (this.declared === undefined) return [];
    return [...buffer.walk(this.declared).missing];
  }

  /** Re-check the declared root; returns the transition it caused, if any. */
  evaluate(buffer: NodeBuffer): ReadinessTransition | undefined {
    const declared = this.declared;
    if (declared === undefined || declared === this.rendered) return undefined;
    if (buffer.walk(declared).missing.length > 0) return undefined;

    const previous = this.rendered;
    this.rendered = declared;
    return previous === undefined
      ? { kind: "ready", rootId: declared }
      : { kind: "root", rootId: declared, previousRootId: previous };
  }
}
