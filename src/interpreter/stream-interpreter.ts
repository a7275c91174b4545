// =============================================================================
// StreamInterpreter — Consumes GSP messages in order, buffers layout & state
// =============================================================================

import { StateBindingResolver } from "../adapters/binding/state-binding-resolver.adapter.js";
import { JsonLineDecoder, lineTooLongError } from "../adapters/decoder/json-line-decoder.adapter.js";
import { parseConfig, type InterpreterConfig, type InterpreterConfigInput } from "../config/interpreter-config.js";
import {
  ClientRequestSchema,
  type ClientRequest,
  type LayoutMessage,
  type LayoutRootMessage,
  type StateUpdateMessage,
  type StreamHeaderMessage,
  type StreamMessage,
} from "../domain/stream-message.schema.js";
import {
  InterpreterBusyError,
  ReentrancyError,
  UninitializedSessionError,
  type MessageError,
} from "../errors.js";
import { createLogger, type Logger } from "../logging/logger.js";
import type { BindingResolverPort } from "../ports/binding-resolver.port.js";
import type { ClientEventHandlerPort } from "../ports/client-event-handler.port.js";
import type { MessageDecoderPort } from "../ports/message-decoder.port.js";
import { isOversizedLine, splitLines, type StreamChunk } from "../streaming/line-splitter.js";
import type {
  ChangeListener,
  ChangeReason,
  InterpreterEventHandler,
  LayoutNode,
  LayoutSnapshot,
  RenderResult,
} from "../types.js";
import { ChangeNotifier } from "./change-notifier.js";
import { buildTree } from "./layout-view.js";
import { NodeBuffer } from "./node-buffer.js";
import { ReadinessTracker, type ReadinessTransition } from "./readiness-tracker.js";

export interface StreamInterpreterOptions {
  /** Partial config; unspecified fields take their defaults. */
  config?: InterpreterConfigInput;
  /** Defaults to a JsonLineDecoder honouring `config.maxLineLength`. */
  decoder?: MessageDecoderPort;
  /** Defaults to a StateBindingResolver honouring `config.bindingKey`. */
  resolver?: BindingResolverPort;
  /** Defaults to a stderr logger at `config.logLevel`. */
  logger?: Logger;
  /** Receives every ClientRequest raised through `emitRequest()`. */
  eventHandler?: ClientEventHandlerPort;
}

export type ProcessResult =
  | { readonly status: "applied"; readonly message: StreamMessage }
  | { readonly status: "rejected"; readonly error: MessageError }
  | { readonly status: "skipped" };

export interface ConsumeSummary {
  readonly lines: number;
  readonly applied: number;
  readonly rejected: number;
  readonly skipped: number;
  readonly ready: boolean;
}

function assertNever(value: never): never {
  throw new Error(`Unhandled message: ${JSON.stringify(value)}`);
}

/**
 * Single-consumer interpreter for one GSP stream.
 *
 * Messages are handled synchronously, one at a time, in arrival order.
 * Listeners are called synchronously from inside that handling and must not
 * call back into `apply()`, `processLine()` or `consume()`; doing so throws
 * {@link ReentrancyError}.
 */
export class StreamInterpreter {
  readonly config: InterpreterConfig;

  private readonly decoder: MessageDecoderPort;
  private readonly resolver: BindingResolverPort;
  private readonly eventHandler: ClientEventHandlerPort | undefined;
  private readonly notifier: ChangeNotifier;
  private readonly buffer = new NodeBuffer();
  private readonly readiness = new ReadinessTracker();
  private state = new Map<string, unknown>();
  private session: string | undefined;
  private logger: Logger;
  private readonly baseLogger: Logger;
  private handling = false;
  private consuming = false;

  constructor(options: StreamInterpreterOptions = {}) {
    this.config = parseConfig(options.config ?? {});
    this.decoder = options.decoder ?? new JsonLineDecoder({ maxLineLength: this.config.maxLineLength });
    this.resolver = options.resolver ?? new StateBindingResolver({ bindingKey: this.config.bindingKey });
    this.eventHandler = options.eventHandler;
    this.baseLogger = options.logger ?? createLogger({ level: this.config.logLevel, component: "interpreter" });
    this.logger = this.baseLogger;
    this.notifier = new ChangeNotifier({ maxListeners: this.config.maxListeners, logger: this.baseLogger });
  }

  // ===========================================================================
  // Input
  // ===========================================================================

  /** Decode and apply one line. Blank lines are skipped. */
  processLine(line: string): ProcessResult {
    return this.guarded("processLine", () => this.handleLine(line));
  }

  /** Apply an already-decoded message. */
  apply(message: StreamMessage): ProcessResult {
    return this.guarded("apply", () => this.dispatch(message));
  }

  /**
   * Process every line of `source` in order until it ends. Rejected lines are
   * reported to `onError` handlers and counted; they never stop the stream.
   * Lines longer than `config.maxLineLength` are discarded while they stream
   * in and rejected as malformed.
   *
   * Throws synchronously when called from a listener ({@link ReentrancyError})
   * or while another `consume()` is running ({@link InterpreterBusyError}).
   */
  consume(source: AsyncIterable<StreamChunk>): Promise<ConsumeSummary> {
    if (this.handling) throw new ReentrancyError("consume");
    if (this.consuming) throw new InterpreterBusyError();
    this.consuming = true;
    return this.drain(source);
  }

  private async drain(source: AsyncIterable<StreamChunk>): Promise<ConsumeSummary> {
    const { maxLineLength } = this.config;
    const counts = { lines: 0, applied: 0, rejected: 0, skipped: 0 };
    try {
      for await (const line of splitLines(source, { maxLineLength })) {
        const lineNumber = ++counts.lines;
        const result = this.guarded("consume", () =>
          isOversizedLine(line)
            ? this.reject(lineTooLongError(maxLineLength), lineNumber)
            : this.handleLine(line, lineNumber),
        );
        counts[result.status]++;
      }
    } finally {
      this.consuming = false;
    }

    this.logger.info("stream:end", { ...counts, ready: this.isReady });
    return { ...counts, ready: this.isReady };
  }

  // ===========================================================================
  // Subscriptions & outbound requests
  // ===========================================================================

  /** Called on the not-ready→ready transition, on a root switch, and on state changes once ready. */
  subscribe(listener: ChangeListener): () => void {
    return this.notifier.on("change", listener);
  }

  onError(handler: InterpreterEventHandler<"error">): () => void {
    return this.notifier.on("error", handler);
  }

  onRequest(handler: InterpreterEventHandler<"request">): () => void {
    return this.notifier.on("request", handler);
  }

  /** Raise a user-interaction request towards the event-handling collaborator. */
  emitRequest(kind: string, payload?: unknown, sourceNodeId?: string): ClientRequest {
    const request = ClientRequestSchema.parse({
      kind,
      payload,
      sessionId: this.session,
      sourceNodeId,
      timestamp: Date.now(),
    });
    this.logger.debug("request:emitted", { kind, sourceNodeId });
    this.notifier.emit("request", { type: "request", request });
    this.eventHandler?.handle(request);
    return request;
  }

  // ===========================================================================
  // Read surface
  // ===========================================================================

  get isReady(): boolean {
    return this.readiness.isReady;
  }

  get sessionId(): string | undefined {
    return this.session;
  }

  /** Root used for rendering; undefined until ready. */
  get rootId(): string | undefined {
    return this.readiness.renderedRootId;
  }

  /** Root declared after readiness that is waiting for its subtree. */
  get pendingRootId(): string | undefined {
    return this.readiness.pendingRootId;
  }

  currentState(): Readonly<Record<string, unknown>> {
    return Object.freeze(Object.fromEntries(this.state));
  }

  currentLayout(): LayoutSnapshot {
    const rootId = this.readiness.renderedRootId;
    if (rootId === undefined) {
      const declared = this.readiness.declaredRootId;
      return declared === undefined
        ? { ready: false, missing: [] }
        : { ready: false, rootId: declared, missing: this.readiness.missing(this.buffer) };
    }

    const nodes: Record<string, LayoutNode> = {};
    for (const node of this.buffer.walk(rootId).nodes) nodes[node.id] = node;
    return { ready: true, rootId, nodes };
  }

  /** Ids reachable from the declared root that have not arrived yet. */
  missingNodeIds(): string[] {
    return this.readiness.missing(this.buffer);
  }

  /** Fresh resolved tree; bindings are resolved against the state as it is now. */
  render(): RenderResult {
    const rootId = this.readiness.renderedRootId;
    if (rootId === undefined) return { ready: false };
    return buildTree({
      buffer: this.buffer,
      rootId,
      resolver: this.resolver,
      state: this.state,
      logger: this.logger,
    });
  }

  // ===========================================================================
  // Dispatch
  // ===========================================================================

  private guarded(operation: string, fn: () => ProcessResult): ProcessResult {
    if (this.handling) throw new ReentrancyError(operation);
    this.handling = true;
    try {
      return fn();
    } finally {
      this.handling = false;
    }
  }

  private handleLine(line: string, lineNumber?: number): ProcessResult {
    if (line.trim().length === 0) return { status: "skipped" };
    const decoded = this.decoder.decode(line);
    if (!decoded.success) return this.reject(decoded.error, lineNumber);
    return this.dispatch(decoded.message, lineNumber);
  }

  private dispatch(message: StreamMessage, lineNumber?: number): ProcessResult {
    if (message.type !== "streamHeader") {
      const sessionError = this.checkSession(message.type, message.sessionId);
      if (sessionError) return this.reject(sessionError, lineNumber);
    }

    switch (message.type) {
      case "streamHeader":
        this.onHeader(message);
        break;
      case "layout":
        this.onLayout(message);
        break;
      case "layoutRoot":
        this.onLayoutRoot(message);
        break;
      case "stateUpdate":
        this.onStateUpdate(message);
        break;
      default:
        return assertNever(message);
    }
    return { status: "applied", message };
  }

  private checkSession(messageType: string, sessionId: string | undefined): UninitializedSessionError | undefined {
    if (this.session === undefined) return new UninitializedSessionError(messageType, sessionId);
    if (sessionId !== undefined && sessionId !== this.session) {
      return new UninitializedSessionError(messageType, sessionId);
    }
    return undefined;
  }

  private onHeader(message: StreamHeaderMessage): void {
    this.session = message.sessionId;
    this.logger = this.baseLogger.withSession(message.sessionId);
    this.logger.info("session:start", { rootId: message.rootId, hasState: message.state !== undefined });

    if (message.state) this.state = new Map(Object.entries(message.state));
    // Readiness is re-evaluated on the next layout or layoutRoot.
    if (message.rootId) this.declareRoot(message.rootId);
    if (message.state && this.isReady) this.notify("state");
  }

  private onLayout(message: LayoutMessage): void {
    const replaced = this.buffer.put({
      id: message.id,
      kind: message.kind,
      properties: message.properties,
      children: message.children,
    });
    this.logger.debug("layout:buffered", { id: message.id, kind: message.kind, replaced });
    this.checkReadiness();
  }

  private onLayoutRoot(message: LayoutRootMessage): void {
    this.declareRoot(message.rootId);
    this.checkReadiness();
  }

  private onStateUpdate(message: StateUpdateMessage): void {
    for (const [key, value] of Object.entries(message.values)) this.state.set(key, value);
    this.logger.debug("state:merged", { keys: Object.keys(message.values) });
    if (this.isReady) this.notify("state");
  }

  private declareRoot(rootId: string): void {
    this.readiness.declare(rootId);
    this.logger.info("root:declared", { rootId, ready: this.isReady });
  }

  private checkReadiness(): void {
    const transition = this.readiness.evaluate(this.buffer);
    if (!transition) return;
    this.logTransition(transition);
    this.notify(transition.kind);
  }

  private logTransition(transition: ReadinessTransition): void {
    if (transition.kind === "ready") {
      this.logger.info("interpreter:ready", { rootId: transition.rootId, nodes: this.buffer.size });
    } else {
      this.logger.info("root:switched", { rootId: transition.rootId, previousRootId: transition.previousRootId });
    }
  }

  private notify(reason: ChangeReason): void {
    const sessionId = this.session;
    if (sessionId === undefined) return;
    this.notifier.emit("change", { type: "change", reason, sessionId });
  }

  private reject(error: MessageError, lineNumber?: number): ProcessResult {
    this.logger.warn("message:rejected", { code: error.code, message: error.message, line: lineNumber });
    this.notifier.emit("error", { type: "error", error, line: lineNumber });
    return { status: "rejected", error };
  }
}
