// =============================================================================
// gsp-interpreter — Core types
// =============================================================================

import type { ClientRequest } from "./domain/stream-message.schema.js";
import type { MessageError } from "./errors.js";

// ─────────────────────────────────────────────────────────────────────────────
// Layout & state
// ─────────────────────────────────────────────────────────────────────────────

/** A literal JSON value or a binding descriptor; told apart at render time. */
export type PropertyValue = unknown;

export interface LayoutNode {
  readonly id: string;
  readonly kind: string;
  readonly properties: Readonly<Record<string, PropertyValue>>;
  readonly children: readonly string[];
}

export type ApplicationState = ReadonlyMap<string, unknown>;

/** Stands in for a bound property whose state key is absent. */
export class UnresolvedBinding {
  readonly key: string;
  constructor(key: string) {
    this.key = key;
  }

  toJSON(): { $unresolved: string } {
    return { $unresolved: this.key };
  }
}

export function isUnresolvedBinding(value: unknown): value is UnresolvedBinding {
  return value instanceof UnresolvedBinding;
}

export type ResolvedProperties = Record<string, unknown>;

export interface ResolvedNode {
  readonly id: string;
  readonly kind: string;
  readonly properties: ResolvedProperties;
  readonly children: readonly ResolvedNode[];
}

// ─────────────────────────────────────────────────────────────────────────────
// Read surface
// ─────────────────────────────────────────────────────────────────────────────

export type LayoutSnapshot =
  | {
      readonly ready: false;
      /** Root declared so far, if any. */
      readonly rootId?: string;
      /** Ids reachable from the declared root that are not buffered yet. */
      readonly missing: readonly string[];
    }
  | {
      readonly ready: true;
      readonly rootId: string;
      /** The root and every buffered node reachable from it. */
      readonly nodes: Readonly<Record<string, LayoutNode>>;
    };

export type RenderResult =
  | { readonly ready: false }
  | {
      readonly ready: true;
      readonly tree: ResolvedNode;
      /** Child ids the rendered tree references but the buffer does not hold. */
      readonly missing: readonly string[];
    };

// ─────────────────────────────────────────────────────────────────────────────
// Notifications
// ─────────────────────────────────────────────────────────────────────────────

export type ChangeReason = "ready" | "state" | "root";

export interface ChangeEvent {
  readonly type: "change";
  readonly reason: ChangeReason;
  readonly sessionId: string;
}

export interface ErrorEvent {
  readonly type: "error";
  readonly error: MessageError;
  /** 1-based line number when the message came from `consume()`. */
  readonly line?: number;
}

export interface RequestEvent {
  readonly type: "request";
  readonly request: ClientRequest;
}

export type InterpreterEvent = ChangeEvent | ErrorEvent | RequestEvent;

export type InterpreterEventType = InterpreterEvent["type"];

export type InterpreterEventOf<K extends InterpreterEventType> = Extract<InterpreterEvent, { type: K }>;

export type InterpreterEventHandler<K extends InterpreterEventType> = (event: InterpreterEventOf<K>) => void;

export type ChangeListener = InterpreterEventHandler<"change">;
