/**
 * Resolved endpoints.
 *
 * @module vm/endpoint
 */

import type { ParsedUri } from '../runtime/uri.js';
import type { RuntimeMap, RuntimeValue } from '../runtime/values.js';

export type HeaderMap = Readonly<Record<string, readonly string[]>>;

export class Endpoint {
  constructor(
    readonly uri: ParsedUri,
    readonly headers: HeaderMap,
    readonly properties: RuntimeMap,
  ) {
    Object.freeze(this);
  }

  toString(): string {
    return this.uri.toString();
  }

  toJSON(): { uri: string; headers: HeaderMap; properties: RuntimeMap } {
    return { uri: this.uri.toString(), headers: this.headers, properties: this.properties };
  }
}

/** Outcome of running a result body */
export type RulesResult = Endpoint | RuntimeValue;

/**
 * Mutable view of an endpoint under construction, handed to extensions so
 * they can add headers and properties.
 */
export class EndpointBuilder {
  private readonly headers = new Map<string, string[]>();
  private readonly properties = new Map<string, RuntimeValue>();

  constructor(readonly uri: ParsedUri) {}

  putHeader(name: string, values: readonly string[]): this {
    this.headers.set(name, [...values]);
    return this;
  }

  addHeaderValue(name: string, value: string): this {
    const values = this.headers.get(name) ?? [];
    values.push(value);
    this.headers.set(name, values);
    return this;
  }

  putProperty(key: string, value: RuntimeValue): this {
    this.properties.set(key, value);
    return this;
  }

  build(): Endpoint {
    const headers = Object.fromEntries(
      [...this.headers].map(([name, values]): [string, readonly string[]] => [name, Object.freeze([...values])]),
    );
    return new Endpoint(this.uri, Object.freeze(headers), Object.freeze(Object.fromEntries(this.properties)));
  }
}
