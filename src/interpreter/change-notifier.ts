// =============================================================================
// ChangeNotifier — Typed publish point for interpreter events
// =============================================================================

import type { Logger } from "../logging/logger.js";
import { silentLogger } from "../logging/logger.js";
import type {
  InterpreterEventHandler,
  InterpreterEventOf,
  InterpreterEventType,
} from "../types.js";

export interface ChangeNotifierOptions {
  /** Maximum listeners allowed per event type (default: 100). */
  maxListeners?: number;
  logger?: Logger;
}

type HandlerSets = {
  [K in InterpreterEventType]: Set<InterpreterEventHandler<K>>;
};

/**
 * Synchronous observer list. Handlers run in registration order; a handler
 * that throws is logged and the remaining handlers still run.
 */
export class ChangeNotifier {
  private readonly handlers: HandlerSets = {
    change: new Set(),
    error: new Set(),
    request: new Set(),
  };
  private readonly maxListeners: number;
  private readonly logger: Logger;

  constructor(options?: ChangeNotifierOptions) {
    this.maxListeners = options?.maxListeners ?? 100;
    this.logger = options?.logger ?? silentLogger;
  }

  /** Subscribe to an event type. Returns unsubscribe fn. */
  on<K extends InterpreterEventType>(type: K, handler: InterpreterEventHandler<K>): () => void {
    const set: Set<InterpreterEventHandler<K>> = this.handlers[type];
    if (set.size >= this.maxListeners) {
      throw new Error(`ChangeNotifier: max listeners (${this.maxListeners}) reached for "${type}"`);
    }
    set.add(handler);
    return () => this.off(type, handler);
  }

  off<K extends InterpreterEventType>(type: K, handler: InterpreterEventHandler<K>): void {
    const set: Set<InterpreterEventHandler<K>> = this.handlers[type];
    set.delete(handler);
  }

  emit<K extends InterpreterEventType>(type: K, event: InterpreterEventOf<K>): void {
    const set: Set<InterpreterEventHandler<K>> = this.handlers[type];
    if (set.size === 0) return;

    // Copy so handlers may unsubscribe while being called.
    for (const handler of [...set]) {
      try {
        handler(event);
      } catch (err) {
        this.logger.error("listener:error", {
          eventType: type,
          error: err instanceof Error ? { message: err.message, stack: err.stack } : String(err),
        });
      }
    }
  }

  listenerCount(type: InterpreterEventType): number {
    return this.handlers[type].size;
  }

  removeAllListeners(type?: InterpreterEventType): void {
    if (type) {
      this.handlers[type].clear();
      return;
    }
    for (const set of Object.values(this.handlers)) set.clear();
  }
}
