const ERRORS = {
  // Markup terminators
  UNTERMINATED_PI: "Processing instruction is missing '?>'",
  UNTERMINATED_COMMENT: "Comment is missing '-->'",
  UNTERMINATED_CDATA: "CDATA section is missing ']]>'",
  UNTERMINATED_DOCTYPE: "DOCTYPE declaration is missing '>'",
  UNTERMINATED_DOCTYPE_SUBSET: "DOCTYPE internal subset is missing ']'",
  UNTERMINATED_TAG: "Start tag is missing '>'",
  UNTERMINATED_CLOSING_TAG: "End tag is missing '>'",
  INVALID_TAG_NAME: "Tag name is empty",

  // Attributes
  ATTR_MISSING_EQ: "Attribute is missing '='",
  ATTR_INVALID_NAME: "Attribute name is empty",
  ATTR_MISSING_QUOTE: "Attribute value is missing",
  ATTR_INVALID_QUOTE: "Attribute value must be quoted with ' or \"",
  ATTR_MISSING_END_QUOTE: "Attribute value is missing its closing quote",

  // Entity references
  UNTERMINATED_ENTITY: "Entity reference is missing ';'",
  INVALID_NAMED_ENTITY: "Unknown named entity reference",
  INVALID_NUMERIC_ENTITY:
    "Numeric character reference is not a valid character",
} as const;

/**
 * A string that identifies a lexical defect in an XML document.
 *
 * - `UNTERMINATED_PI`: Processing instruction is missing `?>`
 * - `UNTERMINATED_COMMENT`: Comment is missing `-->`
 * - `UNTERMINATED_CDATA`: CDATA section is missing `]]>`
 * - `UNTERMINATED_DOCTYPE`: DOCTYPE declaration is missing `>`
 * - `UNTERMINATED_DOCTYPE_SUBSET`: DOCTYPE internal subset is missing `]`
 * - `UNTERMINATED_TAG`: Start tag is missing `>`
 * - `UNTERMINATED_CLOSING_TAG`: End tag is missing `>`
 * - `INVALID_TAG_NAME`: Tag name is empty
 * - `ATTR_MISSING_EQ`: Attribute is missing `=`
 * - `ATTR_INVALID_NAME`: Attribute name is empty
 * - `ATTR_MISSING_QUOTE`: Attribute value is missing
 * - `ATTR_INVALID_QUOTE`: Attribute value is not quoted
 * - `ATTR_MISSING_END_QUOTE`: Attribute value is missing its closing quote
 * - `UNTERMINATED_ENTITY`: Entity reference is missing `;`
 * - `INVALID_NAMED_ENTITY`: Unknown named entity reference
 * - `INVALID_NUMERIC_ENTITY`: Numeric character reference is not a valid
 *   character
 */
export type XmlErrorCode = keyof typeof ERRORS;

/**
 * A lexical error in an XML document.
 *
 * Every lazy sequence (`Scanner`, `Attrs` and `Text`) throws at most one
 * error and behaves as exhausted afterwards. Errors carry no position; compare
 * `Scanner.remaining` across pulls to locate them.
 */
export interface XmlError extends Error {
  name: "XmlError";
  /**
   * A string representing a specific error.
   * @see {@link XmlErrorCode}
   */
  code: XmlErrorCode;
}

/**
 * Returns `true` if the given value is an {@link XmlError}. Mostly useful for
 * type-safety in `catch` clauses.
 */
export function isXmlError(error: unknown): error is XmlError {
  // Structural check, `instanceof` does not hold across realms.
  return typeof error === "object" && error !== null &&
    "name" in error && error.name === "XmlError" &&
    "code" in error && typeof error.code === "string" &&
    Object.prototype.hasOwnProperty.call(ERRORS, error.code);
}

/**
 * Static description of an error code.
 */
export function describeXmlError(code: XmlErrorCode): string {
  return ERRORS[code];
}

// @internal
export function createXmlError(code: XmlErrorCode): XmlError {
  // A plain Error with extra properties, not a subclass.
  return Object.assign(new Error(ERRORS[code]), {name: "XmlError", code} as const);
}
