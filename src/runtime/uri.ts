/**
 * Parsed URI values.
 *
 * Validity is decided by the WHATWG URL parser; the components exposed to
 * rules are taken from the original text so that `path` and `authority`
 * keep exactly what the rule produced (no added trailing slash, no
 * normalized IPv4 shorthand).
 *
 * @module runtime/uri
 */

const SCHEME_PATTERN = /^([a-zA-Z][a-zA-Z0-9+.-]*):\/\//;
const IPV4_PATTERN = /^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})$/;

export class UriSyntaxError extends Error {
  constructor(readonly input: string, options?: { cause?: unknown }) {
    super(`Invalid URI: ${input}`, options);
    this.name = 'UriSyntaxError';
  }
}

export class ParsedUri {
  private constructor(
    private readonly text: string,
    /** Scheme without the trailing colon */
    readonly scheme: string,
    /** Raw authority (userinfo, host and port) */
    readonly authority: string,
    /** Host without userinfo or port; IPv6 hosts keep their brackets */
    readonly host: string,
    /** Raw path, empty when the URI has none */
    readonly path: string,
    readonly query: string | null,
  ) {}

  /**
   * Parse an absolute hierarchical URI (`scheme://authority/path?query`).
   * Throws {@link UriSyntaxError} when the text is not one.
   */
  static parse(text: string): ParsedUri {
    const scheme = SCHEME_PATTERN.exec(text);
    if (!scheme) {
      throw new UriSyntaxError(text);
    }
    try {
      new URL(text);
    } catch (err) {
      throw new UriSyntaxError(text, { cause: err });
    }

    const rest = text.slice(scheme[0].length);
    const authorityEnd = firstIndexOf(rest, ['/', '?', '#']);
    const authority = rest.slice(0, authorityEnd);
    const afterAuthority = rest.slice(authorityEnd);
    const fragmentStart = firstIndexOf(afterAuthority, ['#']);
    const beforeFragment = afterAuthority.slice(0, fragmentStart);
    const queryStart = beforeFragment.indexOf('?');
    const path = queryStart === -1 ? beforeFragment : beforeFragment.slice(0, queryStart);
    const query = queryStart === -1 ? null : beforeFragment.slice(queryStart + 1);

    return new ParsedUri(text, scheme[1].toLowerCase(), authority, hostOf(authority), path, query);
  }

  static tryParse(text: string): ParsedUri | null {
    try {
      return ParsedUri.parse(text);
    } catch {
      return null;
    }
  }

  /** Path with a guaranteed leading and trailing slash */
  get normalizedPath(): string {
    let path = this.path;
    if (!path.startsWith('/')) path = `/${path}`;
    if (!path.endsWith('/')) path = `${path}/`;
    return path;
  }

  /** Whether the host is a literal IPv4 address or a bracketed IPv6 address */
  get isIp(): boolean {
    if (this.host.length > 2 && this.host.startsWith('[') && this.host.endsWith(']')) {
      return true;
    }
    const octets = IPV4_PATTERN.exec(this.host);
    return octets !== null && octets.slice(1).every((o) => Number(o) <= 255);
  }

  equals(other: ParsedUri): boolean {
    return this.text === other.text;
  }

  toString(): string {
    return this.text;
  }

  toJSON(): string {
    return this.text;
  }
}

function firstIndexOf(value: string, chars: readonly string[]): number {
  let min = value.length;
  for (const c of chars) {
    const i = value.indexOf(c);
    if (i !== -1 && i < min) min = i;
  }
  return min;
}

function hostOf(authority: string): string {
  const hostPort = authority.slice(authority.lastIndexOf('@') + 1);
  if (hostPort.startsWith('[')) {
    const close = hostPort.indexOf(']');
    return close === -1 ? hostPort : hostPort.slice(0, close + 1);
  }
  const colon = hostPort.lastIndexOf(':');
  return colon === -1 ? hostPort : hostPort.slice(0, colon);
}
