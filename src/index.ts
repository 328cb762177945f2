/**
 * Copy-free, non-validating XML tokenizer.
 *
 * ```ts
 * import {scan} from "lexml";
 *
 * for (const event of scan('<greeting lang="en">Hello &amp; welcome</greeting>')) {
 *   // {type: "open", name: "greeting", attrs}
 *   // {type: "text", text: "Hello "}
 *   // {type: "text", text: "&amp;"}
 *   // ...
 * }
 * ```
 * @packageDocumentation
 */

export {Attrs} from "./attrs.ts";
export {
  describeXmlError,
  isXmlError,
  type XmlError,
  type XmlErrorCode,
} from "./error.ts";
export {
  type CloseEvent,
  type CommentEvent,
  type DoctypeEvent,
  type Event,
  type OpenEvent,
  type PiEvent,
  scan,
  Scanner,
  type TextEvent,
} from "./scanner.ts";
export {Text, type TextKind} from "./text.ts";
