import type { TrustDomain } from "./trust-domain"
import type { X509Bundle } from "./x509-bundle"

export type BundleFound = {
  readonly kind: "found"
  readonly bundle: X509Bundle
}

export type BundleNotFound = {
  readonly kind: "not_found"
}

export type BundleLookup = BundleFound | BundleNotFound

/**
 * Immutable map from trust domain name to bundle. At most one bundle per
 * trust domain; adding a second one replaces the first in the new set.
 */
export class X509BundleSet {
  private constructor(private readonly bundles: ReadonlyMap<string, X509Bundle>) {}

  static empty(): X509BundleSet {
    return new X509BundleSet(new Map())
  }

  static of(bundles: Iterable<X509Bundle>): X509BundleSet {
    const map = new Map<string, X509Bundle>()
    for (const bundle of bundles) map.set(bundle.trustDomain.name, bundle)

    return new X509BundleSet(map)
  }

  add(bundle: X509Bundle): X509BundleSet {
    return new X509BundleSet(new Map(this.bundles).set(bundle.trustDomain.name, bundle))
  }

  getBundleForTrustDomain(trustDomain: TrustDomain): BundleLookup {
    const bundle = this.bundles.get(trustDomain.name)

    return bundle ? { kind: "found", bundle } : { kind: "not_found" }
  }

  has(trustDomain: TrustDomain): boolean {
    return this.bundles.has(trustDomain.name)
  }

  trustDomains(): TrustDomain[] {
    return [...this.bundles.values()].map((b) => b.trustDomain)
  }

  get size(): number {
    return this.bundles.size
  }
}
