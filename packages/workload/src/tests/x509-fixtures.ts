import {
  createX509Bundle,
  createX509Svid,
  SpiffeId,
  TrustDomain,
  type X509Bundle,
  X509BundleSet,
  type X509Svid,
} from "@wid/spiffe"
import type { X509Context } from "../ports/x509-context"

export function trustDomain(name: string): TrustDomain {
  const result = TrustDomain.parse(name)
  if (!result.ok) throw result.error

  return result.value
}

export function spiffeId(id: string): SpiffeId {
  const result = SpiffeId.parse(id)
  if (!result.ok) throw result.error

  return result.value
}

let serial = 0

/** An SVID with placeholder DER bytes unique to each call. */
export function svid(id: string, hint?: string): X509Svid {
  serial++

  const result = createX509Svid({
    spiffeId: spiffeId(id),
    certificates: [Uint8Array.of(0x30, serial)],
    privateKey: Uint8Array.of(0x30, 0xff, serial),
    ...(hint !== undefined && { hint }),
  })
  if (!result.ok) throw result.error

  return result.value
}

export function bundle(name: string, ...authorities: number[]): X509Bundle {
  return createX509Bundle(
    trustDomain(name),
    authorities.map((a) => Uint8Array.of(0x30, a)),
  )
}

export function x509Context(
  svids: readonly [X509Svid, ...X509Svid[]],
  bundles: readonly X509Bundle[] = [bundle("example.org", 1)],
): X509Context {
  return { svids, bundles: X509BundleSet.of(bundles) }
}
