import { SpiffeId } from "../spiffe-id"
import { TrustDomain } from "../trust-domain"

function parse(input: string): SpiffeId {
  const result = SpiffeId.parse(input)
  if (!result.ok) throw result.error

  return result.value
}

describe("SpiffeId", () => {
  describe("parse", () => {
    it("splits trust domain and path", () => {
      const id = parse("spiffe://example.org/ns/prod/sa/api")

      expect(id.trustDomain.name).toBe("example.org")
      expect(id.path).toBe("/ns/prod/sa/api")
      expect(id.toString()).toBe("spiffe://example.org/ns/prod/sa/api")
    })

    it("accepts an ID without a path", () => {
      const id = parse("spiffe://example.org")

      expect(id.path).toBe("")
      expect(id.toString()).toBe("spiffe://example.org")
    })

    it.each([
      ["", "empty"],
      ["example.org/api", "wrong_scheme"],
      ["SPIFFE://example.org/api", "wrong_scheme"],
      ["spiffe://", "missing_trust_domain"],
      ["spiffe:///api", "missing_trust_domain"],
      ["spiffe://user@example.org/api", "bad_trust_domain_char"],
      ["spiffe://example.org:443/api", "bad_trust_domain_char"],
      ["spiffe://example.org?x=1", "bad_trust_domain_char"],
      ["spiffe://example.org/", "empty_segment"],
      ["spiffe://example.org/a//b", "empty_segment"],
      ["spiffe://example.org/a/./b", "dot_segment"],
      ["spiffe://example.org/..", "dot_segment"],
      ["spiffe://example.org/api?x=1", "bad_path_segment_char"],
      ["spiffe://example.org/api#frag", "bad_path_segment_char"],
    ])("rejects %j with reason %s", (input, reason) => {
      const result = SpiffeId.parse(input)

      expect(result.ok).toBe(false)
      if (result.ok) return

      expect(result.error.reason).toBe(reason)
      expect(result.error.context).toEqual({ reason, input })
    })
  })

  describe("fromSegments", () => {
    it("joins segments under the trust domain", () => {
      const td = TrustDomain.parse("example.org")
      if (!td.ok) throw td.error

      const id = SpiffeId.fromSegments(td.value, "ns", "prod")

      expect(id.ok && id.value.toString()).toBe("spiffe://example.org/ns/prod")
    })

    it("rejects invalid segments", () => {
      const td = TrustDomain.parse("example.org")
      if (!td.ok) throw td.error

      const id = SpiffeId.fromSegments(td.value, "ns", "..")

      expect(id.ok).toBe(false)
      if (id.ok) return
      expect(id.error.reason).toBe("dot_segment")
    })
  })

  it("compares trust domain and path", () => {
    const api = parse("spiffe://example.org/api")

    expect(api.equals(parse("spiffe://example.org/api"))).toBe(true)
    expect(api.equals(parse("spiffe://example.org/web"))).toBe(false)
    expect(api.equals(parse("spiffe://other.org/api"))).toBe(false)
  })

  it("reports trust domain membership", () => {
    const td = TrustDomain.parse("example.org")
    if (!td.ok) throw td.error

    expect(parse("spiffe://example.org/api").memberOf(td.value)).toBe(true)
    expect(parse("spiffe://other.org/api").memberOf(td.value)).toBe(false)
  })
})
