// @internal
export const enum Chars {
  TAB = 0x9,
  LF = 0xA,
  CR = 0xD,
  SP = 0x20,
  QUOTE = 0x22,
  HASH = 0x23,
  AMPERSAND = 0x26,
  APOSTROPHE = 0x27,
  SLASH = 0x2F,
  SEMICOLON = 0x3B,
  LT = 0x3C,
  GT = 0x3E,
  UPPER_X = 0x58,
  OPEN_BRACKET = 0x5B,
  CLOSE_BRACKET = 0x5D,
  LOWER_X = 0x78,
}

// https://www.w3.org/TR/REC-xml/#NT-S
// @internal
export function isWhiteSpace(c: number) {
  return c === Chars.SP || c === Chars.TAB || c === Chars.LF || c === Chars.CR;
}

// @internal
export function isQuote(c: number) {
  return c === Chars.QUOTE || c === Chars.APOSTROPHE;
}

// Any code point except surrogates.
// @internal
export function isScalarValue(c: number) {
  return 0 <= c && c <= 0x10FFFF && !(0xD800 <= c && c <= 0xDFFF);
}

// Index of the first non white space code unit in [start, end), or end.
// @internal
export function skipWhiteSpace(source: string, start: number, end: number) {
  while (start < end && isWhiteSpace(source.charCodeAt(start))) {
    ++start;
  }
  return start;
}

// Index just past the last non white space code unit in [start, end), or
// start.
// @internal
export function trimEndIndex(source: string, start: number, end: number) {
  while (end > start && isWhiteSpace(source.charCodeAt(end - 1))) {
    --end;
  }
  return end;
}
