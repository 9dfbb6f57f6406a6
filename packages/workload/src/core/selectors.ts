import type { SpiffeId, X509Svid } from "@wid/spiffe"
import type { SelectSvidFn, X509SvidSelector } from "../ports/selector"

/** The first candidate, which the Workload API marks as default. */
export const defaultSvidSelector: X509SvidSelector = {
  select: (candidates) => candidates[0],
}

export const lastSvidSelector: X509SvidSelector = {
  select: (candidates) => candidates[candidates.length - 1] ?? candidates[0],
}

/** First candidate with `spiffeId`, else the default. */
export function svidSelectorBySpiffeId(spiffeId: SpiffeId): X509SvidSelector {
  return {
    select: (candidates) =>
      candidates.find((svid) => svid.spiffeId.equals(spiffeId)) ?? candidates[0],
  }
}

/** First candidate carrying `hint`, else the default. */
export function svidSelectorByHint(hint: string): X509SvidSelector {
  return {
    select: (candidates) => candidates.find((svid) => svid.hint === hint) ?? candidates[0],
  }
}

export function toSvidSelector(
  selector: X509SvidSelector | SelectSvidFn | undefined,
): X509SvidSelector {
  if (selector === undefined) return defaultSvidSelector
  if (typeof selector === "function") return { select: selector }

  return selector
}

/** @internal */
export function isCandidate(candidates: readonly X509Svid[], picked: unknown): boolean {
  return candidates.some((svid) => svid === picked)
}
