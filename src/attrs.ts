import {
  Chars,
  isQuote,
  skipWhiteSpace,
  trimEndIndex,
} from "./chars.ts";
import {createXmlError, type XmlError, type XmlErrorCode} from "./error.ts";
import {Fuse, Text} from "./text.ts";

/**
 * Lazily decoded attributes of a start tag.
 *
 * ```xml
 * <element first="1" second='&amp;'>
 * ```
 *
 * Iterating yields `[name, value]` pairs in document order, values are
 * {@link Text} views and are only decoded on demand. A malformed attribute
 * throws an {@link XmlError} from `next()`, after which no more pairs are
 * produced. Duplicate names are not detected.
 *
 * Iteration consumes the view. Use {@link clone} to go over it more than once;
 * {@link get}, {@link has} and {@link toObject} work on a copy.
 */
export class Attrs implements IterableIterator<[string, Text]> {
  // @internal
  private source_: string;
  // @internal
  private index_: number;
  // @internal
  private end_: number;
  // @internal
  private fuse_ = Fuse.ACTIVE;

  constructor(source: string, start = 0, end: number = source.length) {
    this.source_ = source;
    this.index_ = start;
    this.end_ = end;
  }

  /**
   * The attribute text that has not been consumed yet.
   */
  get raw(): string {
    return this.source_.slice(this.index_, this.end_);
  }

  clone(): Attrs {
    const copy = new Attrs(this.source_, this.index_, this.end_);
    copy.fuse_ = this.fuse_;
    return copy;
  }

  [Symbol.iterator](): IterableIterator<[string, Text]> {
    return this;
  }

  /**
   * Read the next attribute.
   * @throws {@link XmlError}
   */
  next(): IteratorResult<[string, Text], undefined> {
    const source = this.source_;
    const end = this.end_;
    const start = skipWhiteSpace(source, this.index_, end);
    if (this.fuse_ === Fuse.EXHAUSTED || start >= end) {
      this.fuse_ = Fuse.EXHAUSTED;
      this.index_ = end;
      return {done: true, value: undefined};
    }

    const eq = source.indexOf("=", start);
    if (eq === -1 || eq >= end) {
      throw this.poison_("ATTR_MISSING_EQ");
    }
    const nameEnd = trimEndIndex(source, start, eq);
    if (nameEnd === start) {
      throw this.poison_("ATTR_INVALID_NAME");
    }

    const valueStart = skipWhiteSpace(source, eq + 1, end);
    if (valueStart >= end) {
      throw this.poison_("ATTR_MISSING_QUOTE");
    }
    const quote = source.charCodeAt(valueStart);
    if (!isQuote(quote)) {
      throw this.poison_("ATTR_INVALID_QUOTE");
    }
    const valueEnd = source.indexOf(
      quote === Chars.QUOTE ? '"' : "'",
      valueStart + 1,
    );
    if (valueEnd === -1 || valueEnd >= end) {
      throw this.poison_("ATTR_MISSING_END_QUOTE");
    }

    this.index_ = valueEnd + 1;
    return {
      done: false,
      value: [
        source.slice(start, nameEnd),
        Text.escaped(source, valueStart + 1, valueEnd),
      ],
    };
  }

  /**
   * Value of the first attribute called `name`, or `undefined`.
   * @throws {@link XmlError} if an attribute before the match is malformed
   */
  get(name: string): Text | undefined {
    for (const [key, value] of this.clone()) {
      if (key === name) {
        return value;
      }
    }
    return undefined;
  }

  /**
   * @throws {@link XmlError} if an attribute before the match is malformed
   */
  has(name: string): boolean {
    return this.get(name) !== undefined;
  }

  /**
   * Decode every attribute into a plain object. When a name appears more than
   * once the last value wins.
   * @throws {@link XmlError}
   */
  toObject(): Record<string, string> {
    const attributes: Record<string, string> = {};
    for (const [key, value] of this.clone()) {
      attributes[key] = value.decode();
    }
    return attributes;
  }

  // @internal
  private poison_(code: XmlErrorCode): XmlError {
    this.fuse_ = Fuse.EXHAUSTED;
    this.index_ = this.end_;
    return createXmlError(code);
  }
}
