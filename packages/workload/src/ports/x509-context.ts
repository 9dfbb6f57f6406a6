import type { X509BundleSet, X509Svid } from "@wid/spiffe"

/**
 * One coherent refresh from the Workload API: the SVIDs issued to this
 * workload and the bundles it should trust.
 */
export type X509Context = Readonly<{
  /** The Workload API lists the default SVID first. */
  svids: readonly [X509Svid, ...X509Svid[]]
  bundles: X509BundleSet
}>
