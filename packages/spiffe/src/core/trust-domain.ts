import { err, ok, type Result } from "@wid/errors"
import { SpiffeIdError } from "./spiffe-id-error"

export const SPIFFE_SCHEME_PREFIX = "spiffe://"

const MAX_TRUST_DOMAIN_LENGTH = 255
const TRUST_DOMAIN_CHARS = /^[a-z0-9._-]+$/

/**
 * Administrative namespace of SPIFFE IDs and the key of trust bundles.
 */
export class TrustDomain {
  private constructor(readonly name: string) {}

  /**
   * Accepts a bare name (`example.org`) or any SPIFFE ID in the domain
   * (`spiffe://example.org/api`).
   */
  static parse(input: string): Result<TrustDomain, SpiffeIdError> {
    if (input === "") return err(new SpiffeIdError("missing_trust_domain", input))

    if (input.includes(":/")) {
      const name = trustDomainOfId(input)

      return typeof name === "string" ? ok(new TrustDomain(name)) : err(name)
    }

    const invalid = validateTrustDomainName(input)

    return invalid ? err(new SpiffeIdError(invalid, input)) : ok(new TrustDomain(input))
  }

  /** `spiffe://<name>` */
  idString(): string {
    return `${SPIFFE_SCHEME_PREFIX}${this.name}`
  }

  equals(other: TrustDomain): boolean {
    return this.name === other.name
  }

  toString(): string {
    return this.name
  }
}

/** @internal */
export function validateTrustDomainName(
  name: string,
): "missing_trust_domain" | "bad_trust_domain_char" | "trust_domain_too_long" | undefined {
  if (name === "") return "missing_trust_domain"
  if (!TRUST_DOMAIN_CHARS.test(name)) return "bad_trust_domain_char"
  if (name.length > MAX_TRUST_DOMAIN_LENGTH) return "trust_domain_too_long"

  return undefined
}

function trustDomainOfId(id: string): string | SpiffeIdError {
  if (!id.startsWith(SPIFFE_SCHEME_PREFIX)) return new SpiffeIdError("wrong_scheme", id)

  const rest = id.slice(SPIFFE_SCHEME_PREFIX.length)
  const slash = rest.indexOf("/")
  const name = slash === -1 ? rest : rest.slice(0, slash)
  const invalid = validateTrustDomainName(name)

  return invalid ? new SpiffeIdError(invalid, id) : name
}
