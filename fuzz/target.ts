import {isXmlError, type Text, scan} from "../src/index.ts";

function drain(text: Text) {
  for (const _ of text);
}

// Pulls every event, attribute and character out of the input. Lexical errors
// are expected, anything else is a bug.
export function fuzz(data: Buffer) {
  const str = data.toString("utf-8");
  try {
    for (const event of scan(str)) {
      if (event.type === "open") {
        for (const [, value] of event.attrs) {
          drain(value);
        }
      } else if (event.type === "text") {
        drain(event.text);
      }
    }
  } catch (error) {
    if (!isXmlError(error)) {
      throw error;
    }
  }
}
