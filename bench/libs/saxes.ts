import type {ReadTokens} from "../index.ts";

import {SaxesParser} from "saxes";

export function saxes(xml: string): ReadTokens {
  const tokens: ReadTokens = {
    comments: 0,
    processingInstructions: 0,
    startTags: 0,
    endTags: 0,
    textNodes: 0,
  };

  const parser = new SaxesParser();

  parser.on("comment", () => {
    ++tokens.comments;
  });

  parser.on("processinginstruction", () => {
    ++tokens.processingInstructions;
  });

  parser.on("opentag", () => {
    ++tokens.startTags;
  });

  parser.on("closetag", () => {
    ++tokens.endTags;
  });

  parser.on("text", () => {
    ++tokens.textNodes;
  });

  // A little help for CDATA
  parser.on("cdata", () => {
    ++tokens.textNodes;
  });

  parser.write(xml).close();
  return tokens;
}
