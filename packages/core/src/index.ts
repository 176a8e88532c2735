export { systemClock } from "./adapters/clock/system-clock"
export { EnvSource, type EnvSourceOptions } from "./adapters/config/env-source"
export { ObjectSource } from "./adapters/config/object-source"
export { createKvSource, type EntityTag, type KvSourceOptions } from "./adapters/kv/kv-source"
export {
  entityStoreKey,
  type KvStoreFetchOptions,
  kvStoreFetch,
} from "./adapters/kv/kv-store-fetch"
export { jsonCodec } from "./adapters/redis/json-codec"
export { RedisBulkReader, type RedisBulkReaderOptions } from "./adapters/redis/redis-bulk-reader"
export {
  type CreateRedisClientOptions,
  createRedisClient,
  type RedisMGetClient,
  type RedisReaderClient,
} from "./adapters/redis/redis-client"
export { ResultCache } from "./core/cache/result-cache"
export { mapWithConcurrency } from "./core/concurrency/map-with-concurrency"
export { withTimeout } from "./core/concurrency/with-timeout"
export {
  ENV_PREFIX,
  type FetchConfig,
  type LoadLoaderConfigOptions,
  type LoaderConfig,
  loadLoaderConfig,
  mapEnvToConfig,
} from "./core/config/load-loader-config"
export { type LoaderEnvConfig, loaderEnvSchema } from "./core/config/schema"
export {
  type BatchContext,
  BatchFetchError,
  DuplicateSourceError,
  FetchTimeoutError,
  InvalidConfigError,
  InvalidItemError,
  MissingItemError,
  NotLoadedError,
  type NotLoadedContext,
  UnknownSourceError,
} from "./core/errors/errors"
export {
  LoaderError,
  type LoaderErrorOptions,
  type SerializeOptions,
  serializeError,
} from "./core/errors/loader-error"
export { stableKey } from "./core/keys/stable-key"
export {
  createLoader,
  Loader,
  type LoaderDeps,
  type LoaderOptions,
  type SourceName,
  type SourceRegistry,
} from "./core/loader/loader"
export { type PendingBatch, PendingMap } from "./core/pending/pending-map"
export {
  BatchSource,
  type BatchSourceDeps,
  type BatchSourceOptions,
} from "./core/source/batch-source"
export type { BatchFetchContext, BatchFetchFn } from "./ports/batch-fetch"
export type { BulkKeyValueReader, KvFound, KvNotFound, KvResult } from "./ports/bulk-reader"
export type { Clock, Milliseconds } from "./ports/clock"
export type { Codec } from "./ports/codec"
export type { ConfigSource } from "./ports/config-source"
export type {
  EmbeddedLookup,
  EmbeddedResolved,
  EmbeddedUnresolved,
  ResolveEmbeddedFn,
} from "./ports/embedded"
export type { AppError, ErrorCode, ErrorContext, SerializedError } from "./ports/error"
export { type BatchKeyId, type ItemKey, isItemKey } from "./ports/item-key"
export { type Failed, failed, type Loaded, type LoadResult, loaded } from "./ports/load-result"
export type { MissingItemPolicy } from "./ports/missing-item-policy"
export type { BatchReport, RunReport, SourceRunReport } from "./ports/run-report"
export type { BatchKeyOf, ItemOf, Source, UnknownSource, ValueOf } from "./ports/source"
