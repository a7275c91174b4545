// =============================================================================
// gsp-interpreter — Public API
// =============================================================================

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export type {
  PropertyValue,
  LayoutNode,
  ApplicationState,
  ResolvedProperties,
  ResolvedNode,
  LayoutSnapshot,
  RenderResult,
  ChangeReason,
  ChangeEvent,
  ErrorEvent,
  RequestEvent,
  InterpreterEvent,
  InterpreterEventType,
  InterpreterEventHandler,
  ChangeListener,
} from "./types.js";
export { UnresolvedBinding, isUnresolvedBinding } from "./types.js";

// ─────────────────────────────────────────────────────────────────────────────
// Wire schemas
// ─────────────────────────────────────────────────────────────────────────────

export {
  MESSAGE_KINDS,
  MessageKindSchema,
  StreamHeaderSchema,
  LayoutSchema,
  LayoutRootSchema,
  StateUpdateSchema,
  StreamMessageSchema,
  ClientRequestSchema,
  isMessageKind,
} from "./domain/stream-message.schema.js";
export type {
  MessageKind,
  StreamMessage,
  StreamHeaderMessage,
  LayoutMessage,
  LayoutRootMessage,
  StateUpdateMessage,
  ClientRequest,
} from "./domain/stream-message.schema.js";

// ─────────────────────────────────────────────────────────────────────────────
// Ports (contracts for hexagonal architecture)
// ─────────────────────────────────────────────────────────────────────────────

export type { MessageDecoderPort, DecodeResult, DecodeError } from "./ports/message-decoder.port.js";
export type { BindingResolverPort } from "./ports/binding-resolver.port.js";
export type { ClientEventHandlerPort } from "./ports/client-event-handler.port.js";

// ─────────────────────────────────────────────────────────────────────────────
// Adapters
// ─────────────────────────────────────────────────────────────────────────────

export {
  JsonLineDecoder,
  DEFAULT_MAX_LINE_LENGTH,
  lineTooLongError,
  type JsonLineDecoderOptions,
} from "./adapters/decoder/json-line-decoder.adapter.js";
export {
  StateBindingResolver,
  DEFAULT_BINDING_KEY,
  type StateBindingResolverOptions,
} from "./adapters/binding/state-binding-resolver.adapter.js";

// ─────────────────────────────────────────────────────────────────────────────
// Interpreter
// ─────────────────────────────────────────────────────────────────────────────

export {
  StreamInterpreter,
  type StreamInterpreterOptions,
  type ProcessResult,
  type ConsumeSummary,
} from "./interpreter/stream-interpreter.js";
export { ChangeNotifier, type ChangeNotifierOptions } from "./interpreter/change-notifier.js";
export { NodeBuffer, type WalkResult } from "./interpreter/node-buffer.js";
export { ReadinessTracker, type ReadinessTransition } from "./interpreter/readiness-tracker.js";
export { buildTree, type BuildTreeParams } from "./interpreter/layout-view.js";

// ─────────────────────────────────────────────────────────────────────────────
// Streaming, config, logging, errors
// ─────────────────────────────────────────────────────────────────────────────

export {
  splitLines,
  fromChunks,
  OversizedLine,
  isOversizedLine,
  type SplitLinesOptions,
  type StreamChunk,
} from "./streaming/line-splitter.js";
export {
  InterpreterConfigSchema,
  ENV_MAP,
  parseConfig,
  loadConfigFile,
  configFromEnv,
  resolveConfig,
  type InterpreterConfig,
  type InterpreterConfigInput,
  type ResolveConfigOptions,
} from "./config/interpreter-config.js";
export {
  createLogger,
  consoleSink,
  formatLogEntry,
  silentLogger,
  LOG_LEVELS,
  type Logger,
  type LoggerOptions,
  type LogEntry,
  type LogLevel,
  type LogLevelSetting,
  type LogSink,
} from "./logging/logger.js";
export {
  GspError,
  MalformedMessageError,
  UnknownMessageKindError,
  UninitializedSessionError,
  ReentrancyError,
  InterpreterBusyError,
  ConfigValidationError,
  type MessageError,
} from "./errors.js";
