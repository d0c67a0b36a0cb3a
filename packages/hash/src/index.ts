export { MemoryCommandTransport, type MemoryCommandTransportOptions } from "./adapters/memory/memory-command-transport"
export {
  createRedisClient,
  REPLY_TYPE_MAPPING,
  type RedisCommandClient,
  type RedisCommandClientOptions,
  type RedisSendOptions,
} from "./adapters/redis/redis-client"
export { RedisCommandTransport, type RedisCommandTransportDeps, toWireValue } from "./adapters/redis/redis-command-transport"
export { convert, type JsonValue } from "./core/codec/convertibles"
export { decode, decodeList, decodeMap, decodePairs, encode, fieldPairs } from "./core/codec/value-codec"
export {
  WireHashCommands,
  type WireHashCommandsDeps,
  type WireHashCommandsOptions,
} from "./core/commands/wire-hash-commands"
export { ArgumentMisuseError, MalformedReplyError, ServerReplyError } from "./core/errors/errors"
export {
  HashError,
  type HashErrorCode,
  type HashErrorContext,
  type HashErrorOptions,
  isHashError,
  type SerializedHashError,
  type SerializeOptions,
  serializeError,
} from "./core/errors/hash-error"
export { ScanCursor, type ScanCursorInit } from "./core/scan/scan-cursor"
export { parseScanPosition, parseScanReply, type ScanReply } from "./core/scan/scan-reply"
export { describeWire, utf8Decode, utf8Encode, wire, wireText } from "./core/wire/wire"
export { type CreateHashClientDeps, createHashClient, type HashClient } from "./config/create-hash-client"
export {
  defaultHashClientSources,
  type HashClientEnv,
  type HashClientSourcesOptions,
  hashClientEnvSchema,
  loadHashClientEnv,
} from "./config/hash-client-env"
export type { CommandTransport } from "./ports/command-transport"
export type { FieldValues, HashCommands, HashScanCursor } from "./ports/hash-commands"
export type { FieldName, HashKey } from "./ports/hash-key"
export {
  type HashScanOptions,
  type HashScanPage,
  SCAN_START,
  type ScanFilter,
  type ScanPosition,
  type ScanState,
} from "./ports/hash-scan"
export type { WireConvertible } from "./ports/wire-convertible"
export type {
  WireArgument,
  WireArray,
  WireBulk,
  WireCommand,
  WireError,
  WireInteger,
  WireKind,
  WireNull,
  WireStatus,
  WireValue,
} from "./ports/wire-value"
