export {
  CommandEngine,
  createCommandEngine,
  resolveEngineOptions,
  type CommandEngineOptions,
  type RegisteredCommandInfo,
} from "./engine";
export {
  decodeParameters,
  encodeValue,
  type AbsentParameters,
  type DecodeOptions,
  type DecodeResult,
  type EncodeResult,
  type JsonValue,
} from "./codec";
export {
  Dispatcher,
  type DispatchOutcome,
  type DispatcherOptions,
  type Envelope,
} from "./dispatcher";
export {
  COMMAND_ERROR_KINDS,
  ConversionError,
  HandlerTimeoutError,
  UNKNOWN_COMMAND_NAME,
  type CommandError,
  type CommandErrorKind,
} from "./errors";
export {
  CommandEvents,
  type CommandErrorListener,
  type CommandExecutedEvent,
  type CommandExecutedListener,
} from "./events";
export { CommandRegistry, type CommandDescriptor, type CommandHandler } from "./registry";
export { DEFAULT_SUGGESTION_MAX_DISTANCE, editDistance, findClosestCommand } from "./suggest";
export {
  TypeTags,
  isTypeTag,
  typeTagName,
  type AnyTypeTagValue,
  type RecordSchema,
  type RecordTag,
  type RgbaColor,
  type TypeTag,
  type TypeTagKind,
  type TypeTagValue,
  type Vector3,
} from "./type-tags";
