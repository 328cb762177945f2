import {Attrs} from "./attrs.ts";
import {
  Chars,
  isQuote,
  isWhiteSpace,
  skipWhiteSpace,
  trimEndIndex,
} from "./chars.ts";
import {createXmlError, type XmlError, type XmlErrorCode} from "./error.ts";
import {Fuse, Text} from "./text.ts";

/**
 * Start tag, `<name attr="value">`. A self-closing tag `<name/>` produces an
 * `open` event immediately followed by a `close` event.
 */
export interface OpenEvent {
  type: "open";
  name: string;
  attrs: Attrs;
}

/**
 * End tag, `</name>`, or the second half of a self-closing tag.
 */
export interface CloseEvent {
  type: "close";
  name: string;
}

/**
 * Document type declaration.
 *
 * ```xml
 * <!DOCTYPE greeting SYSTEM "hello.dtd">
 * <!DOCTYPE greeting [ <!ELEMENT greeting (#PCDATA)> ]>
 * ```
 *
 * `name` is everything before the internal subset (so it includes external
 * identifiers), `internalSubset` is the unparsed text between the brackets or
 * an empty string. Both are trimmed.
 */
export interface DoctypeEvent {
  type: "doctype";
  name: string;
  internalSubset: string;
}

/**
 * Processing instruction, `content` is everything between `<?` and `?>`
 * including the target.
 */
export interface PiEvent {
  type: "pi";
  content: string;
}

export interface CommentEvent {
  type: "comment";
  content: string;
}

/**
 * A run of character data. CDATA sections are `verbatim` text, character data
 * is `verbatim` up to the next reference and every reference is a separate
 * `escaped` text.
 */
export interface TextEvent {
  type: "text";
  text: Text;
}

export type Event =
  | OpenEvent
  | CloseEvent
  | DoctypeEvent
  | PiEvent
  | CommentEvent
  | TextEvent;

const enum Markup {
  PI_START = "<?",
  PI_END = "?>",
  COMMENT_START = "<!--",
  COMMENT_END = "-->",
  CDATA_START = "<![CDATA[",
  CDATA_END = "]]>",
  DOCTYPE_START = "<!DOCTYPE",
  END_TAG_START = "</",
}

function isDoctypeDelimiter(c: number) {
  return c === Chars.OPEN_BRACKET || c === Chars.GT;
}

function isCloseBracket(c: number) {
  return c === Chars.CLOSE_BRACKET;
}

function isGt(c: number) {
  return c === Chars.GT;
}

// Index of the first code unit at or after `start` accepted by `isDelimiter`,
// skipping quoted sections, or -1. A quote without a partner is an ordinary
// character.
function findUnquoted(
  source: string,
  start: number,
  isDelimiter: (c: number) => boolean,
) {
  let unpairedQuote = false;
  let unpairedApos = false;
  for (let i = start; i < source.length; ++i) {
    const c = source.charCodeAt(i);
    if (isDelimiter(c)) {
      return i;
    }
    if (!isQuote(c) || (c === Chars.QUOTE ? unpairedQuote : unpairedApos)) {
      continue;
    }
    const close = source.indexOf(c === Chars.QUOTE ? '"' : "'", i + 1);
    if (close !== -1) {
      i = close;
    } else if (c === Chars.QUOTE) {
      unpairedQuote = true;
    } else {
      unpairedApos = true;
    }
  }
  return -1;
}

function trim(source: string, start: number, end: number) {
  start = skipWhiteSpace(source, start, end);
  return source.slice(start, trimEndIndex(source, start, end));
}

/**
 * Non-validating pull tokenizer over an in-memory XML document.
 *
 * ```ts
 * for (const event of new Scanner(source)) {
 *   if (event.type === "open") {
 *     console.log(event.name, event.attrs.toObject());
 *   }
 * }
 * ```
 *
 * Each call to `next()` produces one {@link Event}. Text and attributes are not
 * decoded by the scanner, {@link Text} and {@link Attrs} views decode them on
 * demand and stay valid after the scanner has moved on.
 *
 * Well-formedness is only checked as far as needed to delimit tokens, e.g.
 * start and end tags are not matched. The first lexical error is thrown from
 * `next()` as an {@link XmlError}; after it the scanner is exhausted.
 */
export class Scanner implements IterableIterator<Event> {
  // @internal
  private source_: string;
  // @internal
  private index_ = 0;
  // Name of the last self-closing tag, its `close` event is due next.
  // @internal
  private pendingClose_: string | undefined = undefined;
  // @internal
  private fuse_ = Fuse.ACTIVE;

  constructor(source: string) {
    this.source_ = source;
  }

  /**
   * Number of code units not consumed yet. The offset of the next token is
   * `source.length - remaining`.
   */
  get remaining(): number {
    return this.source_.length - this.index_;
  }

  [Symbol.iterator](): IterableIterator<Event> {
    return this;
  }

  /**
   * Read the next event.
   * @throws {@link XmlError}
   */
  next(): IteratorResult<Event, undefined> {
    if (this.pendingClose_ !== undefined) {
      const name = this.pendingClose_;
      this.pendingClose_ = undefined;
      return {done: false, value: {type: "close", name}};
    }
    if (this.fuse_ === Fuse.EXHAUSTED || this.index_ >= this.source_.length) {
      this.fuse_ = Fuse.EXHAUSTED;
      return {done: true, value: undefined};
    }
    switch (this.source_.charCodeAt(this.index_)) {
      case Chars.LT:
        return {done: false, value: this.scanMarkup_()};
      case Chars.AMPERSAND:
        return {done: false, value: this.scanReference_()};
      default:
        return {done: false, value: this.scanText_()};
    }
  }

  // @internal
  private scanMarkup_(): Event {
    const source = this.source_;
    const index = this.index_;
    if (source.startsWith(Markup.PI_START, index)) {
      return {
        type: "pi",
        content: this.consumeTo_(
          index + Markup.PI_START.length,
          Markup.PI_END,
          "UNTERMINATED_PI",
        ),
      };
    }
    if (source.startsWith(Markup.COMMENT_START, index)) {
      return {
        type: "comment",
        content: this.consumeTo_(
          index + Markup.COMMENT_START.length,
          Markup.COMMENT_END,
          "UNTERMINATED_COMMENT",
        ),
      };
    }
    if (source.startsWith(Markup.CDATA_START, index)) {
      const start = index + Markup.CDATA_START.length;
      const end = source.indexOf(Markup.CDATA_END, start);
      if (end === -1) {
        throw this.poison_("UNTERMINATED_CDATA");
      }
      this.index_ = end + Markup.CDATA_END.length;
      return {type: "text", text: Text.verbatim(source, start, end)};
    }
    if (source.startsWith(Markup.DOCTYPE_START, index)) {
      return this.scanDoctype_(index + Markup.DOCTYPE_START.length);
    }
    if (source.startsWith(Markup.END_TAG_START, index)) {
      return this.scanEndTag_(index + Markup.END_TAG_START.length);
    }
    return this.scanStartTag_(index + 1);
  }

  // @internal
  private scanDoctype_(start: number): Event {
    const source = this.source_;
    const delimiter = findUnquoted(source, start, isDoctypeDelimiter);
    if (delimiter === -1) {
      throw this.poison_("UNTERMINATED_DOCTYPE");
    }
    const name = trim(source, start, delimiter);
    if (source.charCodeAt(delimiter) === Chars.GT) {
      this.index_ = delimiter + 1;
      return {type: "doctype", name, internalSubset: ""};
    }
    const subsetEnd = findUnquoted(source, delimiter + 1, isCloseBracket);
    if (subsetEnd === -1) {
      throw this.poison_("UNTERMINATED_DOCTYPE_SUBSET");
    }
    const end = source.indexOf(">", subsetEnd + 1);
    if (end === -1) {
      throw this.poison_("UNTERMINATED_DOCTYPE");
    }
    this.index_ = end + 1;
    return {
      type: "doctype",
      name,
      internalSubset: trim(source, delimiter + 1, subsetEnd),
    };
  }

  // @internal
  private scanEndTag_(start: number): Event {
    const end = this.source_.indexOf(">", start);
    if (end === -1) {
      throw this.poison_("UNTERMINATED_CLOSING_TAG");
    }
    const name = trim(this.source_, start, end);
    if (name.length === 0) {
      throw this.poison_("INVALID_TAG_NAME");
    }
    this.index_ = end + 1;
    return {type: "close", name};
  }

  // @internal
  private scanStartTag_(start: number): Event {
    const source = this.source_;
    const end = findUnquoted(source, start, isGt);
    if (end === -1) {
      throw this.poison_("UNTERMINATED_TAG");
    }
    let nameEnd = start;
    while (nameEnd < end) {
      const c = source.charCodeAt(nameEnd);
      if (isWhiteSpace(c) || c === Chars.SLASH) {
        break;
      }
      ++nameEnd;
    }
    if (nameEnd === start) {
      throw this.poison_("INVALID_TAG_NAME");
    }
    const name = source.slice(start, nameEnd);
    const attrsStart = skipWhiteSpace(source, nameEnd, end);
    let attrsEnd = trimEndIndex(source, attrsStart, end);
    if (
      attrsEnd > attrsStart &&
      source.charCodeAt(attrsEnd - 1) === Chars.SLASH
    ) {
      attrsEnd = trimEndIndex(source, attrsStart, attrsEnd - 1);
      this.pendingClose_ = name;
    }
    this.index_ = end + 1;
    return {type: "open", name, attrs: new Attrs(source, attrsStart, attrsEnd)};
  }

  // Only the reference itself when it is terminated before the next tag,
  // everything up to the next tag otherwise. Malformed references are
  // reported when the text is decoded.
  // @internal
  private scanReference_(): Event {
    const source = this.source_;
    const start = this.index_;
    let end = start + 1;
    while (end < source.length) {
      const c = source.charCodeAt(end);
      if (c === Chars.SEMICOLON) {
        ++end;
        break;
      }
      if (c === Chars.LT) {
        break;
      }
      ++end;
    }
    this.index_ = end;
    return {type: "text", text: Text.escaped(source, start, end)};
  }

  // @internal
  private scanText_(): Event {
    const source = this.source_;
    const start = this.index_;
    let end = start;
    while (end < source.length) {
      const c = source.charCodeAt(end);
      if (c === Chars.LT || c === Chars.AMPERSAND) {
        break;
      }
      ++end;
    }
    this.index_ = end;
    return {type: "text", text: Text.verbatim(source, start, end)};
  }

  // @internal
  private consumeTo_(start: number, terminator: string, code: XmlErrorCode) {
    const end = this.source_.indexOf(terminator, start);
    if (end === -1) {
      throw this.poison_(code);
    }
    this.index_ = end + terminator.length;
    return this.source_.slice(start, end);
  }

  // @internal
  private poison_(code: XmlErrorCode): XmlError {
    this.fuse_ = Fuse.EXHAUSTED;
    this.index_ = this.source_.length;
    this.pendingClose_ = undefined;
    return createXmlError(code);
  }
}

/**
 * Shorthand for `new Scanner(source)`.
 */
export function scan(source: string): Scanner {
  return new Scanner(source);
}
