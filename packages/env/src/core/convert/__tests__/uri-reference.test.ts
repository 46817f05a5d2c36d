import { ConversionError } from "../../errors"
import { UriReference } from "../uri-reference"

describe("UriReference", () => {
  it("splits an absolute URL into its components", () => {
    const ref = UriReference.parse("HTTPS://user@Example.com:8080/path?q=1#frag")

    expect(ref).toMatchObject({
      scheme: "https",
      authority: "user@Example.com:8080",
      userinfo: "user",
      host: "Example.com",
      port: "8080",
      path: "/path",
      query: "q=1",
      fragment: "frag",
    })
    expect(ref.isAbsolute).toBe(true)
    expect(ref.href).toBe("https://user@Example.com:8080/path?q=1#frag")
  })

  it("accepts relative references", () => {
    const ref = UriReference.parse("/api/v1?limit=10")

    expect(ref.isAbsolute).toBe(false)
    expect(ref.scheme).toBeUndefined()
    expect(ref.path).toBe("/api/v1")
    expect(ref.query).toBe("limit=10")
    expect(ref.toString()).toBe("/api/v1?limit=10")
  })

  it("keeps bracketed IPv6 hosts", () => {
    const ref = UriReference.parse("http://[::1]:9000/")

    expect(ref.host).toBe("[::1]")
    expect(ref.port).toBe("9000")
  })

  it("resolves against a base with toURL()", () => {
    expect(UriReference.parse("../b").toURL("https://example.com/a/c").href).toBe(
      "https://example.com/b",
    )
  })

  it("serializes as its href", () => {
    expect(JSON.stringify({ url: UriReference.parse("mailto:ops@example.com") })).toBe(
      '{"url":"mailto:ops@example.com"}',
    )
  })

  it("is immutable", () => {
    expect(Object.isFrozen(UriReference.parse("/x"))).toBe(true)
  })

  it.each([
    [":foo", "missing protocol scheme"],
    ["1a:b", "first path segment in URL cannot contain colon"],
    ["http://host:abc/", 'invalid port ":abc" after host'],
    ["http://[::1/", "missing ']' in host"],
    ["/a%zzb", 'invalid URL escape "%zz"'],
    ["http://a\nb", "net/url: invalid control character in URL"],
  ])("rejects %j", (raw, reason) => {
    expect(() => UriReference.parse(raw)).toThrow(
      `Unable to complete URL parse: parse ${JSON.stringify(raw)}: ${reason}`,
    )
  })

  it("fails with a ConversionError carrying the raw input", () => {
    try {
      UriReference.parse(":foo")
      expect.unreachable()
    } catch (err) {
      expect(err).toBeInstanceOf(ConversionError)
      expect(err).toMatchObject({ code: "conversion_failed", context: { raw: ":foo" } })
    }
  })
})
