import {Chars, isScalarValue} from "./chars.ts";
import {createXmlError, isXmlError, type XmlError, type XmlErrorCode} from "./error.ts";

/**
 * `verbatim` text is passed through as-is (CDATA sections and plain character
 * data), `escaped` text may contain entity and character references.
 */
export type TextKind = "verbatim" | "escaped";

// https://www.w3.org/TR/REC-xml/#sec-predefined-ent
const PREDEFINED_ENTITIES: ReadonlyMap<string, string> = new Map([
  ["lt", "<"],
  ["gt", ">"],
  ["amp", "&"],
  ["apos", "'"],
  ["quot", '"'],
]);

// One optional leading `+`, no other sign.
const DEC_DIGITS = /^\+?[0-9]+$/;
const HEX_DIGITS = /^\+?[0-9A-Fa-f]+$/;

// @internal
export const enum Fuse {
  ACTIVE,
  EXHAUSTED,
}

/**
 * A lazily decoded view over a range of a source string.
 *
 * Iterating yields one Unicode code point per step. Entity references in
 * `escaped` text are resolved only when the decoder reaches them, and a
 * malformed reference throws an {@link XmlError} from `next()`; after that the
 * text is exhausted.
 *
 * Iteration consumes the view. Use {@link clone} to decode it more than once.
 */
export class Text implements IterableIterator<string> {
  /**
   * How the underlying range is interpreted.
   */
  readonly kind: TextKind;

  // @internal
  private source_: string;
  // @internal
  private index_: number;
  // @internal
  private end_: number;
  // @internal
  private fuse_ = Fuse.ACTIVE;

  /**
   * Create a text view over `source` from `start` (inclusive) to `end`
   * (exclusive). The whole string is used by default.
   */
  constructor(
    kind: TextKind,
    source: string,
    start = 0,
    end: number = source.length,
  ) {
    this.kind = kind;
    this.source_ = source;
    this.index_ = start;
    this.end_ = end;
  }

  static verbatim(source: string, start?: number, end?: number) {
    return new Text("verbatim", source, start, end);
  }

  static escaped(source: string, start?: number, end?: number) {
    return new Text("escaped", source, start, end);
  }

  /**
   * The part of the view that has not been decoded yet, with references left
   * untouched.
   */
  get raw(): string {
    return this.source_.slice(this.index_, this.end_);
  }

  /**
   * A copy of this view at its current position.
   */
  clone(): Text {
    const copy = new Text(this.kind, this.source_, this.index_, this.end_);
    copy.fuse_ = this.fuse_;
    return copy;
  }

  [Symbol.iterator](): IterableIterator<string> {
    return this;
  }

  /**
   * Decode the next character.
   * @throws {@link XmlError}
   */
  next(): IteratorResult<string, undefined> {
    if (this.fuse_ === Fuse.EXHAUSTED || this.index_ >= this.end_) {
      this.fuse_ = Fuse.EXHAUSTED;
      return {done: true, value: undefined};
    }
    if (
      this.kind === "escaped" &&
      this.source_.charCodeAt(this.index_) === Chars.AMPERSAND
    ) {
      return {done: false, value: this.readReference_()};
    }
    return {done: false, value: this.readCodePoint_()};
  }

  /**
   * Decode a copy of this view into a string.
   * @throws {@link XmlError}
   */
  decode(): string {
    let decoded = "";
    for (const c of this.clone()) {
      decoded += c;
    }
    return decoded;
  }

  /**
   * Same as {@link decode}, so a `Text` can be used in template literals.
   * @throws {@link XmlError}
   */
  toString(): string {
    return this.decode();
  }

  /**
   * Compare the decoded contents of this view with another view or a plain
   * string. Stops at the first differing character; a decoding error on
   * either side makes the values unequal. Neither operand is consumed.
   */
  equals(other: Text | string): boolean {
    const a = this.clone();
    const b = typeof other === "string" ? Text.verbatim(other) : other.clone();
    try {
      for (;;) {
        const x = a.next();
        const y = b.next();
        if (x.done || y.done) {
          return x.done === y.done;
        }
        if (x.value !== y.value) {
          return false;
        }
      }
    } catch (error) {
      if (isXmlError(error)) {
        return false;
      }
      throw error;
    }
  }

  // @internal
  private readCodePoint_() {
    const start = this.index_;
    const c = this.source_.charCodeAt(start);
    // Keep surrogate pairs together.
    const length = 0xD800 <= c && c <= 0xDBFF && start + 1 < this.end_ ? 2 : 1;
    this.index_ += length;
    return this.source_.slice(start, this.index_);
  }

  // @internal
  private readReference_() {
    const semicolon = this.source_.indexOf(";", this.index_ + 1);
    if (semicolon === -1 || semicolon >= this.end_) {
      throw this.poison_("UNTERMINATED_ENTITY");
    }
    const name = this.source_.slice(this.index_ + 1, semicolon);
    this.index_ = semicolon + 1;
    if (name.charCodeAt(0) === Chars.HASH) {
      const codePoint = parseCharRef(name);
      if (!isScalarValue(codePoint)) {
        throw this.poison_("INVALID_NUMERIC_ENTITY");
      }
      return String.fromCodePoint(codePoint);
    }
    const replacement = PREDEFINED_ENTITIES.get(name);
    if (replacement === undefined) {
      throw this.poison_("INVALID_NAMED_ENTITY");
    }
    return replacement;
  }

  // @internal
  private poison_(code: XmlErrorCode): XmlError {
    this.fuse_ = Fuse.EXHAUSTED;
    this.index_ = this.end_;
    return createXmlError(code);
  }
}

// `#60`, `#+60`, `#x3C` or `#x+3C`, NaN when the digits are malformed.
function parseCharRef(name: string) {
  const c = name.charCodeAt(1);
  if (c === Chars.LOWER_X || c === Chars.UPPER_X) {
    const digits = name.slice(2);
    return HEX_DIGITS.test(digits) ? parseInt(digits, 16) : NaN;
  }
  const digits = name.slice(1);
  return DEC_DIGITS.test(digits) ? parseInt(digits, 10) : NaN;
}
