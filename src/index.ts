export { Deta } from './client/deta.js';
export { DetaBase, MAX_PUT_ITEMS } from './client/base.js';
export { configFromEnv, DEFAULT_ENDPOINT, PROJECT_KEY_ENV, ENDPOINT_ENV } from './client/config.js';
export type { DetaConfig, FetchLike, RetryHook, RequestSummary } from './client/config.js';
export { query } from './query/query-object.js';
export type { QueryDefinition, Operator } from './query/types.js';
export { update } from './update/builder.js';
export type { UpdateDefinition } from './update/types.js';
export { item, MAX_ITEM_BYTES } from './record/codec.js';
export {
  isJsonObject,
  getPath,
  getString,
  getNumber,
  getBoolean,
  getArray,
  getObject,
} from './record/accessors.js';
export type {
  JsonPrimitive,
  JsonValue,
  JsonObject,
  BaseRecord,
  RecordInput,
  PutResult,
  QueryOptions,
  QueryPage,
  Base,
} from './types.js';
export {
  DetaError,
  ConfigurationError,
  NetworkError,
  AuthError,
  NotFoundError,
  ConflictError,
  ValidationError,
  DecodeError,
  ServiceError,
} from './errors.js';
