import type { Result } from "@wid/errors"
import type { TrustDomain, X509Bundle, X509Svid } from "@wid/spiffe"
import type { ClosedError, NotFoundError } from "../core/errors"

export type SourceResult<T, E> = Result<T, E>

/**
 * - `init`: subscribed, waiting for the first update
 * - `ready`: serving a snapshot
 * - `failed`: the first event was an error; no source was handed out
 * - `closed`: terminal
 */
export type SourceState = "init" | "ready" | "failed" | "closed"

export interface X509SvidSource {
  getX509Svid(): SourceResult<X509Svid, ClosedError>
}

export interface X509BundleSource {
  getX509BundleForTrustDomain(
    trustDomain: TrustDomain,
  ): SourceResult<X509Bundle, ClosedError | NotFoundError>
}
