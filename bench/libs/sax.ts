import type {ReadTokens} from "../index.ts";

import sax1 from "sax";

export function sax(xml: string): ReadTokens {
  const tokens: ReadTokens = {
    comments: 0,
    processingInstructions: 0,
    startTags: 0,
    endTags: 0,
    textNodes: 0,
  };

  const parser = new sax1.SAXParser(true);

  parser.oncomment = () => {
    ++tokens.comments;
  };

  parser.onprocessinginstruction = () => {
    ++tokens.processingInstructions;
  };

  parser.onopentag = () => {
    ++tokens.startTags;
  };

  parser.onclosetag = () => {
    ++tokens.endTags;
  };

  parser.ontext = () => {
    ++tokens.textNodes;
  };

  // A little help for CDATA
  parser.oncdata = () => {
    ++tokens.textNodes;
  };

  parser.write(xml).close();
  return tokens;
}
