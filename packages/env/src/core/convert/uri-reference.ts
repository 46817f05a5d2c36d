import { ConversionError } from "../errors"

// RFC 3986, appendix B
const URI_REFERENCE = /^(?:([^:/?#]+):)?(?:\/\/([^/?#]*))?([^?#]*)(?:\?([^#]*))?(?:#(.*))?$/s
const SCHEME = /^[A-Za-z][A-Za-z0-9+.-]*$/
const CONTROL = /[\x00-\x1f\x7f]/
const BAD_ESCAPE = /%(?![0-9A-Fa-f]{2})/
const PORT = /^[0-9]*$/

/**
 * A parsed URI reference, absolute (`https://host/x`) or relative
 * (`/x?y`, `../x`, `//host/x`).
 *
 * The platform `URL` only represents absolute URLs; use `toURL(base)` to get
 * one from a relative reference.
 */
export class UriReference {
  private constructor(
    readonly scheme: string | undefined,
    readonly authority: string | undefined,
    readonly userinfo: string | undefined,
    readonly host: string,
    readonly port: string,
    readonly path: string,
    readonly query: string | undefined,
    readonly fragment: string | undefined,
  ) {
    Object.freeze(this)
  }

  /** @throws ConversionError when `raw` is not a URI reference */
  static parse(raw: string): UriReference {
    const fail = (reason: string): never => {
      throw new ConversionError(
        `Unable to complete URL parse: parse ${JSON.stringify(raw)}: ${reason}`,
        { raw, reason },
      )
    }

    if (CONTROL.test(raw)) fail("net/url: invalid control character in URL")
    if (raw.startsWith(":")) fail("missing protocol scheme")

    const match = URI_REFERENCE.exec(raw)
    if (!match) return fail("invalid URI reference")

    const [, scheme, authority, path = "", query, fragment] = match

    if (scheme !== undefined && !SCHEME.test(scheme)) {
      fail("first path segment in URL cannot contain colon")
    }

    let userinfo: string | undefined
    let host = ""
    let port = ""

    if (authority !== undefined) {
      const at = authority.lastIndexOf("@")
      const hostPort = at === -1 ? authority : authority.slice(at + 1)
      if (at !== -1) userinfo = authority.slice(0, at)

      if (hostPort.startsWith("[")) {
        const close = hostPort.indexOf("]")
        if (close === -1) fail("missing ']' in host")
        host = hostPort.slice(0, close + 1)
        const rest = hostPort.slice(close + 1)
        if (rest !== "" && !rest.startsWith(":")) {
          fail(`invalid port ${JSON.stringify(rest)} after host`)
        }
        port = rest.slice(1)
      } else {
        const colon = hostPort.lastIndexOf(":")
        host = colon === -1 ? hostPort : hostPort.slice(0, colon)
        port = colon === -1 ? "" : hostPort.slice(colon + 1)
      }

      if (!PORT.test(port)) fail(`invalid port ${JSON.stringify(`:${port}`)} after host`)
    }

    for (const part of [userinfo, host, path, fragment]) {
      const escape = part === undefined ? -1 : part.search(BAD_ESCAPE)
      if (part !== undefined && escape !== -1) {
        fail(`invalid URL escape ${JSON.stringify(part.slice(escape, escape + 3))}`)
      }
    }

    return new UriReference(
      scheme?.toLowerCase(),
      authority,
      userinfo,
      host,
      port,
      path,
      query,
      fragment,
    )
  }

  get isAbsolute(): boolean {
    return this.scheme !== undefined
  }

  get href(): string {
    return [
      this.scheme !== undefined ? `${this.scheme}:` : "",
      this.authority !== undefined ? `//${this.authority}` : "",
      this.path,
      this.query !== undefined ? `?${this.query}` : "",
      this.fragment !== undefined ? `#${this.fragment}` : "",
    ].join("")
  }

  /** Resolve into a platform `URL`. Relative references need a `base`. */
  toURL(base?: string | URL): URL {
    return new URL(this.href, base)
  }

  toString(): string {
    return this.href
  }

  toJSON(): string {
    return this.href
  }
}
