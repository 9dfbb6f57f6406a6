import type { X509Svid } from "@wid/spiffe"

/**
 * Picks the SVID a source serves out of the candidates of one update.
 *
 * `candidates` is never empty; the result must be one of its entries.
 */
export interface X509SvidSelector {
  select(candidates: readonly [X509Svid, ...X509Svid[]]): X509Svid
}

export type SelectSvidFn = X509SvidSelector["select"]
