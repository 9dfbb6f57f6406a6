export { SpiffeId } from "./core/spiffe-id"
export { SpiffeIdError, type SpiffeIdErrorReason } from "./core/spiffe-id-error"
export { SPIFFE_SCHEME_PREFIX, TrustDomain } from "./core/trust-domain"
export { createX509Bundle, type X509Bundle } from "./core/x509-bundle"
export {
  type BundleFound,
  type BundleLookup,
  type BundleNotFound,
  X509BundleSet,
} from "./core/x509-bundle-set"
export { createX509Svid, leafCertificate, type X509Svid, X509SvidError } from "./core/x509-svid"
