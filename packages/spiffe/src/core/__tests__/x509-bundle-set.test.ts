import { TrustDomain } from "../trust-domain"
import { createX509Bundle } from "../x509-bundle"
import { X509BundleSet } from "../x509-bundle-set"

function td(name: string): TrustDomain {
  const result = TrustDomain.parse(name)
  if (!result.ok) throw result.error

  return result.value
}

describe("X509BundleSet", () => {
  const exampleBundle = createX509Bundle(td("example.org"), [Uint8Array.of(1)])
  const otherBundle = createX509Bundle(td("other.org"), [Uint8Array.of(2)])

  it("finds the bundle of a trust domain", () => {
    const set = X509BundleSet.of([exampleBundle, otherBundle])

    expect(set.getBundleForTrustDomain(td("other.org"))).toEqual({
      kind: "found",
      bundle: otherBundle,
    })
    expect(set.size).toBe(2)
  })

  it("reports not_found for unknown trust domains", () => {
    const set = X509BundleSet.of([otherBundle])

    expect(set.getBundleForTrustDomain(td("example.org"))).toEqual({ kind: "not_found" })
    expect(set.has(td("example.org"))).toBe(false)
  })

  it("add returns a new set and leaves the original unchanged", () => {
    const empty = X509BundleSet.empty()
    const one = empty.add(exampleBundle)

    expect(empty.size).toBe(0)
    expect(one.size).toBe(1)
    expect(one.has(td("example.org"))).toBe(true)
  })

  it("keeps one bundle per trust domain, the last added", () => {
    const replacement = createX509Bundle(td("example.org"), [Uint8Array.of(3)])
    const set = X509BundleSet.of([exampleBundle]).add(replacement)

    expect(set.size).toBe(1)
    expect(set.getBundleForTrustDomain(td("example.org"))).toEqual({
      kind: "found",
      bundle: replacement,
    })
  })

  it("lists its trust domains", () => {
    const set = X509BundleSet.of([exampleBundle, otherBundle])

    expect(set.trustDomains().map((t) => t.name)).toEqual(["example.org", "other.org"])
  })

  it("freezes bundles", () => {
    expect(Object.isFrozen(exampleBundle)).toBe(true)
    expect(Object.isFrozen(exampleBundle.authorities)).toBe(true)
  })
})
