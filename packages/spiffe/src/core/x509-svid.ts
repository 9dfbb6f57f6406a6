import { BaseError, err, ok, type Result } from "@wid/errors"
import type { SpiffeId } from "./spiffe-id"

/**
 * An X.509 SVID: certificate chain and private key for one SPIFFE ID.
 *
 * Certificate and key bytes are DER and treated as opaque here.
 */
export type X509Svid = Readonly<{
  spiffeId: SpiffeId

  /** Leaf first, never empty. */
  certificates: readonly Uint8Array[]

  /** PKCS#8 DER. */
  privateKey: Uint8Array

  /** Operator-assigned label that tells SVIDs of one workload apart. */
  hint?: string
}>

export class X509SvidError extends BaseError<"invalid_svid"> {
  constructor(message: string, spiffeId: SpiffeId) {
    super(message, { code: "invalid_svid", context: { spiffeId: spiffeId.toString() } })
  }
}

export function createX509Svid(init: X509Svid): Result<X509Svid, X509SvidError> {
  if (init.certificates.length === 0) {
    return err(new X509SvidError("certificate chain is empty", init.spiffeId))
  }
  if (init.privateKey.length === 0) {
    return err(new X509SvidError("private key is empty", init.spiffeId))
  }

  return ok(
    Object.freeze({
      spiffeId: init.spiffeId,
      certificates: Object.freeze([...init.certificates]),
      privateKey: init.privateKey,
      ...(init.hint !== undefined && { hint: init.hint }),
    }),
  )
}

/** The leaf certificate of the chain. */
export function leafCertificate(svid: X509Svid): Uint8Array | undefined {
  return svid.certificates[0]
}
