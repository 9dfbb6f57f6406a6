import { type Clock, type Milliseconds, SystemClock, type UnixMs } from "@wid/clock"
import { type AppError, BaseError, err, ok, toAppError } from "@wid/errors"
import { type Logger, NullLogger } from "@wid/logger"
import type { TrustDomain, X509Bundle, X509BundleSet, X509Svid } from "@wid/spiffe"
import type { SelectSvidFn, X509SvidSelector } from "../ports/selector"
import type {
  SourceResult,
  SourceState,
  X509BundleSource,
  X509SvidSource,
} from "../ports/source"
import type {
  WatchSubscription,
  X509ContextWatchClient,
  X509ContextWatchClientFactory,
} from "../ports/watch-client"
import type { X509Context } from "../ports/x509-context"
import { formatEndpointAddress, resolveEndpointAddress } from "./address"
import {
  ClosedError,
  ConfigurationError,
  ConnectionError,
  NotFoundError,
  TimeoutError,
} from "./errors"
import { Gate } from "./gate"
import { isCandidate, toSvidSelector } from "./selectors"

/**
 * What a source serves between two updates. Both fields come from the same
 * update; `version` grows by one per applied update.
 */
export type X509Snapshot = Readonly<{
  svid: X509Svid
  bundles: X509BundleSet
  version: number
  updatedAt: UnixMs
}>

/**
 * What happens when the watch fails after the first update.
 * - `keep-last`: log a warning and keep serving the last snapshot
 * - `close`: log an error and close the source
 */
export type WatchErrorPolicy = "keep-last" | "close"

/** Largest delay a Node.js timer honours; longer ones fire at once. */
export const MAX_INIT_TIMEOUT_MS = 2_147_483_647

export type X509SourceOptions = {
  /** Overrides `SPIFFE_ENDPOINT_SOCKET`. Ignored when `deps.client` is set. */
  endpointAddress?: string

  /** @default defaultSvidSelector */
  selector?: X509SvidSelector | SelectSvidFn

  /**
   * Upper bound on the wait for the first update or error, at most
   * {@link MAX_INIT_TIMEOUT_MS}. Waits indefinitely when unset.
   */
  initTimeoutMs?: Milliseconds

  /** @default "keep-last" */
  watchErrorPolicy?: WatchErrorPolicy
}

export type X509SourceDeps = {
  /** Builds a client for the resolved address. The source closes it on `close()`. */
  clientFactory?: X509ContextWatchClientFactory

  /** A ready client. Takes precedence over `clientFactory`; the caller keeps ownership. */
  client?: X509ContextWatchClient

  logger?: Logger
  clock?: Clock

  /** @default process.env */
  env?: Readonly<Record<string, string | undefined>>
}

export type CreateX509SourceError = ConfigurationError | ConnectionError | TimeoutError

type InitOutcome =
  | { kind: "ready" }
  | { kind: "error"; error: ConnectionError }
  | { kind: "timeout"; timeoutMs: Milliseconds }

type ClientHandle = {
  client: X509ContextWatchClient
  ownsClient: boolean
  endpoint?: string
}

/**
 * Live X.509 SVID and bundle source fed by a Workload API watch.
 *
 * Obtain one with {@link createX509Source}; it is only handed out once the
 * first update has been applied. Reads never wait. Every update replaces the
 * snapshot in one assignment, so a read sees the SVID and the bundles of the
 * same update.
 */
export class X509Source implements X509SvidSource, X509BundleSource {
  private current: X509Snapshot | undefined
  private lifecycle: SourceState = "init"
  private closing: Promise<void> | undefined
  private subscription: WatchSubscription | undefined
  private readonly initGate = new Gate<InitOutcome>()

  private constructor(
    private readonly handle: ClientHandle,
    private readonly selector: X509SvidSelector,
    private readonly watchErrorPolicy: WatchErrorPolicy,
    private readonly clock: Clock,
    private readonly logger: Logger,
  ) {}

  static async create(
    deps: X509SourceDeps = {},
    options: X509SourceOptions = {},
  ): Promise<SourceResult<X509Source, CreateX509SourceError>> {
    const { initTimeoutMs } = options

    if (
      initTimeoutMs !== undefined &&
      (!Number.isFinite(initTimeoutMs) ||
        initTimeoutMs <= 0 ||
        initTimeoutMs > MAX_INIT_TIMEOUT_MS)
    ) {
      return err(
        new ConfigurationError(
          `initTimeoutMs must be a positive number no greater than ${MAX_INIT_TIMEOUT_MS}`,
          { context: { initTimeoutMs } },
        ),
      )
    }

    const handle = openClient(deps, options)
    if (!handle.ok) return handle

    const logger = (deps.logger ?? new NullLogger()).child({
      module: "x509-source",
      ...(handle.value.endpoint !== undefined && { endpoint: handle.value.endpoint }),
    })

    const source = new X509Source(
      handle.value,
      toSvidSelector(options.selector),
      options.watchErrorPolicy ?? "keep-last",
      deps.clock ?? new SystemClock(),
      logger,
    )

    const outcome = await source.start(initTimeoutMs)

    if (outcome.kind === "ready") return ok(source)

    await source.teardown()

    if (outcome.kind === "timeout") {
      logger.error("Timed out waiting for the first X.509 context", {
        timeoutMs: outcome.timeoutMs,
      })

      return err(
        new TimeoutError(
          `No X.509 context received from the Workload API within ${outcome.timeoutMs}ms`,
          { context: { timeoutMs: outcome.timeoutMs } },
        ),
      )
    }

    logger.error("Workload API watch failed before the first X.509 context", {
      err: outcome.error,
    })

    return err(outcome.error)
  }

  get state(): SourceState {
    return this.lifecycle
  }

  getX509Svid(): SourceResult<X509Svid, ClosedError> {
    const snapshot = this.snapshot()
    if (!snapshot.ok) return snapshot

    return ok(snapshot.value.svid)
  }

  getX509BundleForTrustDomain(
    trustDomain: TrustDomain,
  ): SourceResult<X509Bundle, ClosedError | NotFoundError> {
    const snapshot = this.snapshot()
    if (!snapshot.ok) return snapshot

    const lookup = snapshot.value.bundles.getBundleForTrustDomain(trustDomain)

    if (lookup.kind === "not_found") {
      return err(
        new NotFoundError(`No X.509 bundle for trust domain "${trustDomain.name}"`, {
          context: { trustDomain: trustDomain.name },
        }),
      )
    }

    return ok(lookup.bundle)
  }

  /** The snapshot currently served. */
  snapshot(): SourceResult<X509Snapshot, ClosedError> {
    const snapshot = this.current

    if (this.lifecycle === "closed" || snapshot === undefined) return err(new ClosedError())

    return ok(snapshot)
  }

  isClosed(): boolean {
    return this.lifecycle === "closed"
  }

  /**
   * Stops the watch and, when the source built the client, closes it.
   *
   * The source is closed as soon as this is called. Every call returns the
   * same promise; teardown runs once. Teardown failures are logged, not
   * rethrown; the promise rejects only if the logger itself throws.
   */
  close(): Promise<void> {
    if (this.closing) return this.closing

    this.lifecycle = "closed"
    this.current = undefined
    this.closing = this.teardown().then(() => {
      this.logger.info("X.509 source closed")
    })

    return this.closing
  }

  private async start(initTimeoutMs: Milliseconds | undefined): Promise<InitOutcome> {
    try {
      this.subscription = this.handle.client.watchX509Context({
        onUpdate: (update) => this.onUpdate(update),
        onError: (error) => this.onError(error),
      })
    } catch (cause) {
      this.settle({
        kind: "error",
        error: new ConnectionError("Failed to start the Workload API watch", {
          cause,
          ...this.endpointContext(),
        }),
      })
    }

    if (initTimeoutMs === undefined) return this.initGate.wait

    const controller = new AbortController()
    const timer = this.clock.sleep(initTimeoutMs, controller.signal).then(() => {
      this.settle({ kind: "timeout", timeoutMs: initTimeoutMs })
    })

    const outcome = await this.initGate.wait

    controller.abort()
    await timer

    return outcome
  }

  private settle(outcome: InitOutcome): void {
    if (this.initGate.open(outcome)) {
      this.lifecycle = outcome.kind === "ready" ? "ready" : "failed"
    }
  }

  private onUpdate(update: X509Context): void {
    if (this.lifecycle === "closed" || this.lifecycle === "failed") return

    const svid = this.select(update)
    if (!svid.ok) {
      this.onError(svid.error)
      return
    }

    const snapshot: X509Snapshot = Object.freeze({
      svid: svid.value,
      bundles: update.bundles,
      version: (this.current?.version ?? 0) + 1,
      updatedAt: this.clock.nowMs(),
    })

    this.current = snapshot

    const meta = { version: snapshot.version, spiffeId: snapshot.svid.spiffeId.toString() }

    if (this.lifecycle === "init") {
      this.settle({ kind: "ready" })
      this.logger.info("Received first X.509 context", meta)
    } else {
      this.logger.debug("Applied X.509 context update", meta)
    }
  }

  private onError(error: unknown): void {
    if (this.lifecycle === "closed" || this.lifecycle === "failed") return

    if (this.lifecycle === "init") {
      this.settle({
        kind: "error",
        error: new ConnectionError("Workload API watch failed before the first update", {
          cause: error,
          ...this.endpointContext(),
        }),
      })
      return
    }

    const version = this.current?.version

    if (this.watchErrorPolicy === "close") {
      this.logger.error("Workload API watch failed; closing source", { err: error, version })
      this.close().catch((cause: unknown) => {
        this.logger.error("Failed to close source after a watch failure", { err: cause })
      })
      return
    }

    this.logger.warn("Workload API watch failed; serving last X.509 context", {
      err: error,
      version,
    })
  }

  private select(update: X509Context): SourceResult<X509Svid, AppError> {
    let picked: X509Svid

    try {
      picked = this.selector.select(update.svids)
    } catch (cause) {
      return err(toAppError(cause, "selector"))
    }

    if (!isCandidate(update.svids, picked)) {
      return err(
        new BaseError("Selector returned an SVID that is not among the candidates", {
          code: "selector",
          isOperational: false,
        }),
      )
    }

    return ok(picked)
  }

  private async teardown(): Promise<void> {
    try {
      await this.subscription?.unsubscribe()
    } catch (cause) {
      this.logger.warn("Failed to stop the Workload API watch", { err: cause })
    }

    if (!this.handle.ownsClient) return

    try {
      await this.handle.client.close()
    } catch (cause) {
      this.logger.warn("Failed to close the Workload API client", { err: cause })
    }
  }

  private endpointContext(): { context?: { endpoint: string } } {
    const { endpoint } = this.handle

    return endpoint === undefined ? {} : { context: { endpoint } }
  }
}

/**
 * Subscribes to the Workload API and resolves once the first X.509 context
 * or error arrives.
 *
 * @example
 * ```ts
 * const result = await createX509Source(
 *   { clientFactory: (address) => new GrpcX509ContextWatchClient(address), logger },
 *   { initTimeoutMs: 10_000 },
 * )
 * if (!result.ok) throw result.error
 *
 * const svid = result.value.getX509Svid()
 * ```
 */
export function createX509Source(
  deps: X509SourceDeps = {},
  options: X509SourceOptions = {},
): Promise<SourceResult<X509Source, CreateX509SourceError>> {
  return X509Source.create(deps, options)
}

function openClient(
  deps: X509SourceDeps,
  options: X509SourceOptions,
): SourceResult<ClientHandle, ConfigurationError | ConnectionError> {
  if (deps.client) return ok({ client: deps.client, ownsClient: false })

  const address = resolveEndpointAddress(options.endpointAddress, deps.env)
  if (!address.ok) return address

  const endpoint = formatEndpointAddress(address.value)

  if (!deps.clientFactory) {
    return err(
      new ConfigurationError("No Workload API client or client factory configured", {
        context: { endpoint },
      }),
    )
  }

  try {
    return ok({ client: deps.clientFactory(address.value), ownsClient: true, endpoint })
  } catch (cause) {
    return err(
      new ConnectionError("Failed to create the Workload API client", {
        cause,
        context: { endpoint },
      }),
    )
  }
}
