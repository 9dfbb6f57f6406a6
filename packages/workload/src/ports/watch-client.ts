import type { EndpointAddress } from "./endpoint-address"
import type { X509Context } from "./x509-context"

/**
 * Receives events of a watch. Handlers run synchronously on delivery and
 * must not throw.
 */
export interface Watcher<T> {
  onUpdate(update: T): void
  onError(error: unknown): void
}

export interface WatchSubscription {
  /**
   * Stops delivery. No handler runs once the returned promise settles.
   * Calling it again has no effect.
   */
  unsubscribe(): Promise<void>
}

/**
 * Streaming client of the Workload API, limited to X.509 contexts.
 *
 * Transports (gRPC over a unix socket, TCP) live behind this port.
 */
export interface X509ContextWatchClient {
  watchX509Context(watcher: Watcher<X509Context>): WatchSubscription

  /** Releases the connection. Subscriptions still open receive nothing further. */
  close(): Promise<void>
}

export type X509ContextWatchClientFactory = (
  address: EndpointAddress,
) => X509ContextWatchClient
