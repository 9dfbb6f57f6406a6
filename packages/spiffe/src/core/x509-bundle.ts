import type { TrustDomain } from "./trust-domain"

/**
 * Trusted X.509 authorities (DER) of one trust domain.
 */
export type X509Bundle = Readonly<{
  trustDomain: TrustDomain
  authorities: readonly Uint8Array[]
}>

export function createX509Bundle(
  trustDomain: TrustDomain,
  authorities: readonly Uint8Array[],
): X509Bundle {
  return Object.freeze({ trustDomain, authorities: Object.freeze([...authorities]) })
}
