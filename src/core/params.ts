/**
 * A single request header. Several headers may share a key; they are folded
 * into one comma-separated value when the request is sent.
 */
export class RequestHeader {
  /** Creates a header from a key + value */
  constructor(
    readonly key: string,
    readonly value: string,
  ) {}

  /** Shorthand for `new RequestHeader(key, value)` */
  static of(key: string, value: string): RequestHeader {
    return new RequestHeader(key, value);
  }

  /**
   * Folds a header list into a record, joining values of the same key with `", "`
   * in list order.
   *
   * @example
   * RequestHeader.toRecord([RequestHeader.of('Accept', 'a'), RequestHeader.of('Accept', 'b')]);
   * // { Accept: 'a, b' }
   */
  static toRecord(headers: Iterable<RequestHeader>): Record<string, string> {
    const folded = new Map<string, string[]>();
    for (const { key, value } of headers) {
      const values = folded.get(key);
      if (values) {
        values.push(value);
        continue;
      }

      folded.set(key, [value]);
    }

    return Object.fromEntries([...folded].map(([key, values]) => [key, values.join(', ')]));
  }
}

/**
 * A single query parameter. Requests keep one copy of each distinct key + value pair.
 */
export class RequestQuery {
  /** Creates a query parameter from a key + value */
  constructor(
    readonly key: string,
    readonly value: string,
  ) {}

  /** Shorthand for `new RequestQuery(key, value)` */
  static of(key: string, value: string): RequestQuery {
    return new RequestQuery(key, value);
  }

  /** Identity used for set semantics, distinct for every key + value pair */
  get identity(): string {
    return JSON.stringify([this.key, this.value]);
  }
}

/**
 * Replaces every `{key}` placeholder of an endpoint template with `value`.
 * Requests keep one parameter per key, the last one added wins.
 */
export class PathParameter {
  /** Creates a path parameter from a key + value */
  constructor(
    readonly key: string,
    readonly value: string,
  ) {}

  /** Shorthand for `new PathParameter(key, value)` */
  static of(key: string, value: string): PathParameter {
    return new PathParameter(key, value);
  }

  /** Placeholder this parameter substitutes, e.g. `{id}` */
  get placeholder(): string {
    return `{${this.key}}`;
  }
}
