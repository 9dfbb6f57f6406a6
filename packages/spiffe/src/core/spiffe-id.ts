import { err, ok, type Result } from "@wid/errors"
import { SpiffeIdError } from "./spiffe-id-error"
import { SPIFFE_SCHEME_PREFIX, TrustDomain } from "./trust-domain"

const PATH_SEGMENT_CHARS = /^[a-zA-Z0-9._-]+$/

/**
 * A workload identity: `spiffe://<trust-domain>/<path>`.
 *
 * @example
 * ```ts
 * const id = SpiffeId.parse("spiffe://example.org/ns/prod/sa/api")
 * if (id.ok) id.value.trustDomain.name // "example.org"
 * ```
 */
export class SpiffeId {
  private constructor(
    readonly trustDomain: TrustDomain,
    /** Empty, or `/`-prefixed segments without a trailing slash. */
    readonly path: string,
  ) {}

  static parse(input: string): Result<SpiffeId, SpiffeIdError> {
    if (input === "") return err(new SpiffeIdError("empty", input))
    if (!input.startsWith(SPIFFE_SCHEME_PREFIX)) {
      return err(new SpiffeIdError("wrong_scheme", input))
    }

    const rest = input.slice(SPIFFE_SCHEME_PREFIX.length)
    const slash = rest.indexOf("/")
    const name = slash === -1 ? rest : rest.slice(0, slash)
    const path = slash === -1 ? "" : rest.slice(slash)

    // Ports, userinfo, queries and fragments all fail the character check.
    const trustDomain = TrustDomain.parse(name)
    if (!trustDomain.ok) return err(new SpiffeIdError(trustDomain.error.reason, input))

    const badPath = validatePath(path)
    if (badPath) return err(new SpiffeIdError(badPath, input))

    return ok(new SpiffeId(trustDomain.value, path))
  }

  /** Builds an ID from a trust domain and path segments, e.g. `("ns", "prod")`. */
  static fromSegments(
    trustDomain: TrustDomain,
    ...segments: string[]
  ): Result<SpiffeId, SpiffeIdError> {
    const path = segments.map((s) => `/${s}`).join("")
    const badPath = validatePath(path)

    if (badPath) return err(new SpiffeIdError(badPath, `${trustDomain.idString()}${path}`))

    return ok(new SpiffeId(trustDomain, path))
  }

  memberOf(trustDomain: TrustDomain): boolean {
    return this.trustDomain.equals(trustDomain)
  }

  equals(other: SpiffeId): boolean {
    return this.trustDomain.equals(other.trustDomain) && this.path === other.path
  }

  toString(): string {
    return `${this.trustDomain.idString()}${this.path}`
  }
}

function validatePath(
  path: string,
): "empty_segment" | "dot_segment" | "bad_path_segment_char" | undefined {
  if (path === "") return undefined

  for (const segment of path.slice(1).split("/")) {
    if (segment === "") return "empty_segment"
    if (segment === "." || segment === "..") return "dot_segment"
    if (!PATH_SEGMENT_CHARS.test(segment)) return "bad_path_segment_char"
  }

  return undefined
}
