// Reader for Wayland-style protocol descriptions, built on the event stream.
// It is stricter than the tokenizer: unknown elements, misplaced end tags and
// malformed attribute values are errors.

import type {Attrs} from "./attrs.ts";
import {type Event, Scanner} from "./scanner.ts";

const ERRORS = {
  UNEXPECTED_ELEMENT: (detail: string) => `Unexpected element ${detail}`,
  MISSING_ATTRIBUTE: (detail: string) => `Missing required attribute ${detail}`,
  INVALID_ATTRIBUTE: (detail: string) => `Invalid attribute value ${detail}`,
  UNEXPECTED_EOF: (detail: string) =>
    `Unexpected end of document, expected ${detail}`,
} as const;

export type ProtocolErrorCode = keyof typeof ERRORS;

/**
 * The document is lexically valid XML but does not describe a protocol.
 * Lexical errors are thrown as they are, see `isXmlError`.
 */
export interface ProtocolError extends Error {
  name: "ProtocolError";
  code: ProtocolErrorCode;
}

export function isProtocolError(error: unknown): error is ProtocolError {
  return typeof error === "object" && error !== null &&
    "name" in error && error.name === "ProtocolError" &&
    "code" in error && typeof error.code === "string" &&
    Object.prototype.hasOwnProperty.call(ERRORS, error.code);
}

function createProtocolError(
  code: ProtocolErrorCode,
  detail: string,
): ProtocolError {
  return Object.assign(
    new Error(ERRORS[code](detail)),
    {name: "ProtocolError", code} as const,
  );
}

export type ArgType =
  | "new_id"
  | "int"
  | "uint"
  | "fixed"
  | "string"
  | "object"
  | "array"
  | "fd";

const ARG_TYPES: ReadonlySet<string> = new Set<ArgType>([
  "new_id",
  "int",
  "uint",
  "fixed",
  "string",
  "object",
  "array",
  "fd",
]);

function isArgType(value: string): value is ArgType {
  return ARG_TYPES.has(value);
}

export interface Description {
  summary: string;
  /**
   * Text content of the element, white space is preserved.
   */
  body: string;
}

export interface Arg {
  name: string;
  type: ArgType;
  summary?: string | undefined;
  interface?: string | undefined;
  allowNull: boolean;
  enum?: string | undefined;
  description?: Description | undefined;
}

export interface Message {
  name: string;
  /**
   * `true` for requests declared with `type="destructor"`.
   */
  destructor: boolean;
  since: number;
  deprecatedSince?: number | undefined;
  description?: Description | undefined;
  args: Arg[];
}

export interface Entry {
  name: string;
  value: number;
  summary?: string | undefined;
  since: number;
  deprecatedSince?: number | undefined;
  description?: Description | undefined;
}

export interface Enum {
  name: string;
  since: number;
  bitfield: boolean;
  description?: Description | undefined;
  deprecatedSince?: number | undefined;
  entries: Entry[];
}

export interface Interface {
  name: string;
  version: number;
  description?: Description | undefined;
  requests: Message[];
  events: Message[];
  enums: Enum[];
}

export interface Protocol {
  name: string;
  copyright: string;
  description?: Description | undefined;
  interfaces: Interface[];
}

const MAX_UINT32 = 0xFFFF_FFFF;

function parseUint32(value: string, radix: 10 | 16) {
  const valid = radix === 16 ? /^[0-9A-Fa-f]+$/ : /^[0-9]+$/;
  if (!valid.test(value)) {
    return undefined;
  }
  const n = parseInt(value, radix);
  return n <= MAX_UINT32 ? n : undefined;
}

class ProtocolReader {
  private scanner_: Scanner;
  // Name and attributes of the start tag being read.
  private element_ = "";
  private attrs_: Attrs | undefined = undefined;

  constructor(source: string) {
    this.scanner_ = new Scanner(source);
  }

  read(): Protocol {
    for (;;) {
      const event = this.next_("'<protocol>'");
      if (event.type === "open" && event.name === "protocol") {
        this.enter_(event.name, event.attrs);
        return this.protocol_();
      }
    }
  }

  private protocol_(): Protocol {
    const protocol: Protocol = {
      name: this.requiredString_("name"),
      copyright: "",
      interfaces: [],
    };
    this.children_("protocol", (name) => {
      switch (name) {
        case "copyright":
          protocol.copyright = this.body_("copyright");
          return true;
        case "description":
          protocol.description = this.description_();
          return true;
        case "interface":
          protocol.interfaces.push(this.interface_());
          return true;
      }
      return false;
    });
    return protocol;
  }

  private interface_(): Interface {
    const iface: Interface = {
      name: this.requiredString_("name"),
      version: this.requiredUint_("version"),
      requests: [],
      events: [],
      enums: [],
    };
    this.children_("interface", (name) => {
      switch (name) {
        case "description":
          iface.description = this.description_();
          return true;
        case "request":
          iface.requests.push(this.message_("request"));
          return true;
        case "event":
          iface.events.push(this.message_("event"));
          return true;
        case "enum":
          iface.enums.push(this.enum_());
          return true;
      }
      return false;
    });
    return iface;
  }

  private message_(element: "request" | "event"): Message {
    const message: Message = {
      name: this.requiredString_("name"),
      destructor: this.string_("type") === "destructor",
      since: this.uint_("since") ?? 1,
      deprecatedSince: this.uint_("deprecated-since"),
      args: [],
    };
    this.children_(element, (name) => {
      switch (name) {
        case "description":
          message.description = this.description_();
          return true;
        case "arg":
          message.args.push(this.arg_());
          return true;
      }
      return false;
    });
    return message;
  }

  private arg_(): Arg {
    const name = this.requiredString_("name");
    const type = this.requiredString_("type");
    if (!isArgType(type)) {
      throw createProtocolError("INVALID_ATTRIBUTE", `'type' of <arg>: ${type}`);
    }
    const arg: Arg = {
      name,
      type,
      summary: this.string_("summary"),
      interface: this.string_("interface"),
      allowNull: this.boolean_("allow-null") ?? false,
      enum: this.string_("enum"),
    };
    this.children_("arg", (child) => {
      if (child === "description") {
        arg.description = this.description_();
        return true;
      }
      return false;
    });
    return arg;
  }

  private enum_(): Enum {
    const enumeration: Enum = {
      name: this.requiredString_("name"),
      since: this.uint_("since") ?? 1,
      deprecatedSince: this.uint_("deprecated-since"),
      bitfield: this.boolean_("bitfield") ?? false,
      entries: [],
    };
    this.children_("enum", (name) => {
      switch (name) {
        case "description":
          enumeration.description = this.description_();
          return true;
        case "entry":
          enumeration.entries.push(this.entry_());
          return true;
      }
      return false;
    });
    return enumeration;
  }

  private entry_(): Entry {
    const entry: Entry = {
      name: this.requiredString_("name"),
      value: this.entryValue_(),
      summary: this.string_("summary"),
      since: this.uint_("since") ?? 1,
      deprecatedSince: this.uint_("deprecated-since"),
    };
    this.children_("entry", (name) => {
      if (name === "description") {
        entry.description = this.description_();
        return true;
      }
      return false;
    });
    return entry;
  }

  private description_(): Description {
    const summary = this.requiredString_("summary");
    return {summary, body: this.body_("description")};
  }

  // Text content up to the end tag of `element`, nested elements are not
  // allowed.
  private body_(element: string): string {
    let body = "";
    for (;;) {
      const event = this.next_(`'</${element}>'`);
      switch (event.type) {
        case "text":
          body += event.text.decode();
          break;
        case "open":
          throw createProtocolError(
            "UNEXPECTED_ELEMENT",
            `'<${event.name}>' in '<${element}>'`,
          );
        case "close":
          this.expectClose_(element, event.name);
          return body;
      }
    }
  }

  // Read child elements up to the end tag of `element`. `child` reads a child
  // whose start tag was just consumed and returns `false` for unknown names.
  private children_(element: string, child: (name: string) => boolean) {
    for (;;) {
      const event = this.next_(`'</${element}>'`);
      if (event.type === "open") {
        this.enter_(event.name, event.attrs);
        if (!child(event.name)) {
          throw createProtocolError(
            "UNEXPECTED_ELEMENT",
            `'<${event.name}>' in '<${element}>'`,
          );
        }
      } else if (event.type === "close") {
        this.expectClose_(element, event.name);
        return;
      }
    }
  }

  private expectClose_(element: string, name: string) {
    if (name !== element) {
      throw createProtocolError(
        "UNEXPECTED_ELEMENT",
        `'</${name}>' in '<${element}>'`,
      );
    }
  }

  private enter_(element: string, attrs: Attrs) {
    this.element_ = element;
    this.attrs_ = attrs;
  }

  private next_(expected: string): Event {
    const result = this.scanner_.next();
    if (result.done) {
      throw createProtocolError("UNEXPECTED_EOF", expected);
    }
    return result.value;
  }

  private string_(name: string): string | undefined {
    return this.attrs_?.get(name)?.decode();
  }

  private requiredString_(name: string): string {
    const value = this.string_(name);
    if (value === undefined) {
      throw createProtocolError(
        "MISSING_ATTRIBUTE",
        `'${name}' of <${this.element_}>`,
      );
    }
    return value;
  }

  private uint_(name: string): number | undefined {
    const value = this.string_(name);
    if (value === undefined) {
      return undefined;
    }
    return this.checked_(name, value, parseUint32(value, 10));
  }

  private requiredUint_(name: string): number {
    const value = this.requiredString_(name);
    return this.checked_(name, value, parseUint32(value, 10));
  }

  private boolean_(name: string): boolean | undefined {
    const value = this.string_(name);
    if (value === undefined) {
      return undefined;
    }
    return this.checked_(
      name,
      value,
      value === "true" ? true : value === "false" ? false : undefined,
    );
  }

  // Decimal, or hexadecimal with a `0x` prefix.
  private entryValue_(): number {
    const value = this.requiredString_("value");
    const parsed = value.startsWith("0x")
      ? parseUint32(value.slice(2), 16)
      : parseUint32(value, 10);
    return this.checked_("value", value, parsed);
  }

  private checked_<T>(name: string, value: string, parsed: T | undefined): T {
    if (parsed === undefined) {
      throw createProtocolError(
        "INVALID_ATTRIBUTE",
        `'${name}' of <${this.element_}>: ${value}`,
      );
    }
    return parsed;
  }
}

/**
 * Read a protocol description.
 *
 * ```xml
 * <protocol name="example">
 *   <interface name="example_surface" version="2">
 *     <request name="destroy" type="destructor"/>
 *   </interface>
 * </protocol>
 * ```
 *
 * Anything before the `protocol` element is skipped.
 * @throws {@link ProtocolError} or `XmlError`
 */
export function parseProtocol(source: string): Protocol {
  return new ProtocolReader(source).read();
}
