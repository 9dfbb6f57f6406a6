export {
  MemoryX509ContextWatchClient,
  type MemoryWatchClientOptions,
} from "./adapters/memory/memory-watch-client"
export {
  type CreateX509SourceFromEnvDeps,
  createX509SourceFromEnv,
} from "./config/create-x509-source-from-env"
export {
  loadX509SourceConfig,
  mapEnvToX509SourceConfig,
  type X509SourceConfig,
} from "./config/load-x509-source-config"
export { type X509SourceEnvConfig, x509SourceEnvSchema } from "./config/schema"
export { formatEndpointAddress, parseEndpointAddress, resolveEndpointAddress } from "./core/address"
export {
  ClosedError,
  ConfigurationError,
  ConnectionError,
  NotFoundError,
  TimeoutError,
} from "./core/errors"
export { Gate } from "./core/gate"
export {
  defaultSvidSelector,
  lastSvidSelector,
  svidSelectorByHint,
  svidSelectorBySpiffeId,
  toSvidSelector,
} from "./core/selectors"
export {
  type CreateX509SourceError,
  createX509Source,
  MAX_INIT_TIMEOUT_MS,
  type WatchErrorPolicy,
  X509Source,
  type X509SourceDeps,
  type X509SourceOptions,
  type X509Snapshot,
} from "./core/x509-source"
export {
  type EndpointAddress,
  SPIFFE_ENDPOINT_SOCKET,
  type TcpEndpointAddress,
  type UnixEndpointAddress,
} from "./ports/endpoint-address"
export type { SelectSvidFn, X509SvidSelector } from "./ports/selector"
export type {
  SourceResult,
  SourceState,
  X509BundleSource,
  X509SvidSource,
} from "./ports/source"
export type {
  WatchSubscription,
  Watcher,
  X509ContextWatchClient,
  X509ContextWatchClientFactory,
} from "./ports/watch-client"
export type { X509Context } from "./ports/x509-context"
