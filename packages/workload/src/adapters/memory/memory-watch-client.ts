import type { WatchSubscription, Watcher, X509ContextWatchClient } from "../../ports/watch-client"
import type { X509Context } from "../../ports/x509-context"

export type MemoryWatchClientOptions = {
  /** Deliver the most recent pushed context to watchers that subscribe later. */
  replayLatest?: boolean
}

/**
 * In-process Workload API stand-in. `push()` and `fail()` deliver
 * synchronously to every live watcher.
 */
export class MemoryX509ContextWatchClient implements X509ContextWatchClient {
  private readonly watchers = new Set<Watcher<X509Context>>()
  private latest: X509Context | undefined
  private closed = false

  private subscribed = 0
  private unsubscribed = 0
  private closeCalls = 0

  constructor(private readonly options: MemoryWatchClientOptions = {}) {}

  watchX509Context(watcher: Watcher<X509Context>): WatchSubscription {
    this.subscribed++

    if (this.closed) {
      watcher.onError(new Error("client is closed"))
      return { unsubscribe: async () => {} }
    }

    this.watchers.add(watcher)
    if (this.options.replayLatest && this.latest) watcher.onUpdate(this.latest)

    let active = true

    return {
      unsubscribe: async () => {
        if (!active) return

        active = false
        this.unsubscribed++
        this.watchers.delete(watcher)
      },
    }
  }

  async close(): Promise<void> {
    this.closeCalls++
    this.closed = true
    this.watchers.clear()
  }

  push(context: X509Context): void {
    this.latest = context
    for (const watcher of [...this.watchers]) watcher.onUpdate(context)
  }

  fail(error: unknown): void {
    for (const watcher of [...this.watchers]) watcher.onError(error)
  }

  /** Watchers currently receiving events. */
  get watcherCount(): number {
    return this.watchers.size
  }

  get subscribeCount(): number {
    return this.subscribed
  }

  get unsubscribeCount(): number {
    return this.unsubscribed
  }

  get closeCount(): number {
    return this.closeCalls
  }

  get isClosed(): boolean {
    return this.closed
  }
}
