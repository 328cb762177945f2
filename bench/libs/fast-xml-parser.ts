import {XMLParser} from "fast-xml-parser";
import type {ReadTokens} from "../index.ts";

// Builds a whole object tree, there are no token counts to report.
export function fast_xml_parser(xml: string): ReadTokens {
  new XMLParser({ignoreAttributes: false}).parse(xml);
  return {
    comments: 0,
    processingInstructions: 0,
    startTags: 0,
    endTags: 0,
    textNodes: 0,
  };
}
