import type {ReadTokens} from "../index.ts";

import {scan} from "../../src/index.ts";

export function lexml(xml: string): ReadTokens {
  const tokens: ReadTokens = {
    comments: 0,
    processingInstructions: 0,
    startTags: 0,
    endTags: 0,
    textNodes: 0,
  };
  for (const event of scan(xml)) {
    switch (event.type) {
      case "comment":
        ++tokens.comments;
        break;
      case "pi":
        ++tokens.processingInstructions;
        break;
      case "open":
        ++tokens.startTags;
        // Decode attributes too, the other parsers always do
        for (const [, value] of event.attrs) {
          value.decode();
        }
        break;
      case "close":
        ++tokens.endTags;
        break;
      case "text":
        ++tokens.textNodes;
        event.text.decode();
        break;
    }
  }
  return tokens;
}
