import {expect} from "chai";
import {isXmlError, scan, Scanner} from "../src/index.ts";
import {events, toCanonical} from "./template.ts";

// Code of the error thrown by the first pull, checking that the scanner is
// exhausted afterwards.
function onlyError(source: string) {
  const scanner = scan(source);
  let code: string | undefined;
  try {
    scanner.next();
  } catch (error) {
    if (isXmlError(error)) {
      code = error.code;
    }
  }
  expect(scanner.next().done).to.be.true;
  return code;
}

describe("Scanner", function() {
  describe("text", function() {
    it("input without markup is a single verbatim text", function() {
      expect(events("Hello, world!")).deep.equals([
        {type: "text", kind: "verbatim", raw: "Hello, world!"},
      ]);
    });
    it("keeps astral characters in one text", function() {
      const [event] = [...scan("café \u{1F600}")];
      expect(event).to.have.property("type", "text");
      if (event?.type === "text") {
        expect(event.text.equals("café \u{1F600}")).to.be.true;
      }
    });
    it("splits text at every reference", function() {
      expect(events("a &amp; b")).deep.equals([
        {type: "text", kind: "verbatim", raw: "a "},
        {type: "text", kind: "escaped", raw: "&amp;"},
        {type: "text", kind: "verbatim", raw: " b"},
      ]);
    });
    it("emits adjacent references separately", function() {
      expect(events("&#60;&#x3E;")).deep.equals([
        {type: "text", kind: "escaped", raw: "&#60;"},
        {type: "text", kind: "escaped", raw: "&#x3E;"},
      ]);
    });
    it("decodes predefined entities across events", function() {
      let decoded = "";
      for (const event of scan("&lt;&gt;&amp;&apos;&quot;")) {
        if (event.type === "text") {
          decoded += event.text.decode();
        }
      }
      expect(decoded).equals("<>&'\"");
    });
    it("leaves an unterminated reference for the decoder", function() {
      expect(events("&lt <a>")).deep.equals([
        {type: "text", kind: "escaped", raw: "&lt "},
        {type: "open", name: "a", attrs: ""},
      ]);
    });
    it("does not look for ';' past the next tag", function() {
      expect(events("&amp<b>;")).deep.equals([
        {type: "text", kind: "escaped", raw: "&amp"},
        {type: "open", name: "b", attrs: ""},
        {type: "text", kind: "verbatim", raw: ";"},
      ]);
    });
  });

  describe("tags", function() {
    it("start and end tags", function() {
      expect(events("<a>t</a>")).deep.equals([
        {type: "open", name: "a", attrs: ""},
        {type: "text", kind: "verbatim", raw: "t"},
        {type: "close", name: "a"},
      ]);
    });
    it("self-closing tag is followed by its close event", function() {
      expect(events("<el a='v'/>")).deep.equals([
        {type: "open", name: "el", attrs: "a='v'"},
        {type: "close", name: "el"},
      ]);
    });
    it("self-closing tag with white space before '/'", function() {
      expect(events("<element attr='value' />")).deep.equals([
        {type: "open", name: "element", attrs: "attr='value'"},
        {type: "close", name: "element"},
      ]);
    });
    it("self-closing tag without attributes", function() {
      expect(events("<a/><b />")).deep.equals([
        {type: "open", name: "a", attrs: ""},
        {type: "close", name: "a"},
        {type: "open", name: "b", attrs: ""},
        {type: "close", name: "b"},
      ]);
    });
    it("attributes spanning lines", function() {
      expect(events('<a\n  b="1"\n/>')).deep.equals([
        {type: "open", name: "a", attrs: 'b="1"'},
        {type: "close", name: "a"},
      ]);
    });
    it("'>' inside a quoted attribute value does not end the tag", function() {
      expect(events('<a href="x>y">t</a>')).deep.equals([
        {type: "open", name: "a", attrs: 'href="x>y"'},
        {type: "text", kind: "verbatim", raw: "t"},
        {type: "close", name: "a"},
      ]);
    });
    it("'/>' inside a quoted attribute value is not self-closing", function() {
      expect(events("<a b='/>'>")).deep.equals([
        {type: "open", name: "a", attrs: "b='/>'"},
      ]);
    });
    it("an unpaired quote does not hide the end of the tag", function() {
      expect(events('<element attr="unterminated>')).deep.equals([
        {type: "open", name: "element", attrs: 'attr="unterminated'},
      ]);
    });
    it("end tag name is trimmed", function() {
      expect(events("</ name >")).deep.equals([{type: "close", name: "name"}]);
    });
    it("end tags are not matched against start tags", function() {
      expect(events("<a></b>")).deep.equals([
        {type: "open", name: "a", attrs: ""},
        {type: "close", name: "b"},
      ]);
    });
  });

  describe("processing instructions and comments", function() {
    it("processing instruction content", function() {
      expect(events("<?target content?>")).deep.equals([
        {type: "pi", content: "target content"},
      ]);
    });
    it("comment content is not trimmed", function() {
      expect(events("<!-- comment -->")).deep.equals([
        {type: "comment", content: " comment "},
      ]);
    });
    it("empty comment", function() {
      expect(events("<!---->")).deep.equals([{type: "comment", content: ""}]);
    });
    it("comment containing markup", function() {
      expect(events("<!-- <a> & -->x")).deep.equals([
        {type: "comment", content: " <a> & "},
        {type: "text", kind: "verbatim", raw: "x"},
      ]);
    });
  });

  describe("CDATA sections", function() {
    it("CDATA section is verbatim text", function() {
      expect(events("<![CDATA[<raw> &amp;]]>")).deep.equals([
        {type: "text", kind: "verbatim", raw: "<raw> &amp;"},
      ]);
    });
    it("empty CDATA section", function() {
      expect(events("<![CDATA[]]>")).deep.equals([
        {type: "text", kind: "verbatim", raw: ""},
      ]);
    });
    it("CDATA section containing brackets", function() {
      expect(events("<![CDATA[ [[]] ]]]>")).deep.equals([
        {type: "text", kind: "verbatim", raw: " [[]] ]"},
      ]);
    });
  });

  describe("DOCTYPE", function() {
    it("DOCTYPE with an internal subset", function() {
      expect(events("<!DOCTYPE greeting [ <!ELEMENT greeting (#PCDATA)> ]>"))
        .deep.equals([{
          type: "doctype",
          name: "greeting",
          internalSubset: "<!ELEMENT greeting (#PCDATA)>",
        }]);
    });
    it("DOCTYPE with an external identifier", function() {
      expect(events('<!DOCTYPE greeting SYSTEM "hello.dtd">')).deep.equals([{
        type: "doctype",
        name: 'greeting SYSTEM "hello.dtd"',
        internalSubset: "",
      }]);
    });
    it("brackets inside quoted identifiers", function() {
      expect(events('<!DOCTYPE d SYSTEM "x[1].dtd">')).deep.equals([{
        type: "doctype",
        name: 'd SYSTEM "x[1].dtd"',
        internalSubset: "",
      }]);
    });
    it("'>' inside a quoted external identifier", function() {
      expect(events('<!DOCTYPE d SYSTEM "a>b.dtd"><d/>')).deep.equals([
        {type: "doctype", name: 'd SYSTEM "a>b.dtd"', internalSubset: ""},
        {type: "open", name: "d", attrs: ""},
        {type: "close", name: "d"},
      ]);
    });
    it("']' and '>' inside quoted entity values", function() {
      expect(events('<!DOCTYPE d [<!ENTITY x "a>b]">]><d/>')).deep.equals([
        {type: "doctype", name: "d", internalSubset: '<!ENTITY x "a>b]">'},
        {type: "open", name: "d", attrs: ""},
        {type: "close", name: "d"},
      ]);
    });
    it("white space between ']' and '>'", function() {
      expect(events("<!DOCTYPE d [ ] >")).deep.equals([
        {type: "doctype", name: "d", internalSubset: ""},
      ]);
    });
    it("anything between ']' and '>' is dropped", function() {
      expect(events("<!DOCTYPE d [ ] junk ><d/>")).deep.equals([
        {type: "doctype", name: "d", internalSubset: ""},
        {type: "open", name: "d", attrs: ""},
        {type: "close", name: "d"},
      ]);
    });
    it("whole document with DOCTYPE and internal subset", function() {
      const doc = '<?xml version="1.0" encoding="UTF-8"?>\n' +
        "<!DOCTYPE greeting [\n <!ELEMENT greeting (#PCDATA)>\n]>\n" +
        "<greeting>Hello, world!</greeting>";
      expect(events(doc)).deep.equals([
        {type: "pi", content: 'xml version="1.0" encoding="UTF-8"'},
        {type: "text", kind: "verbatim", raw: "\n"},
        {
          type: "doctype",
          name: "greeting",
          internalSubset: "<!ELEMENT greeting (#PCDATA)>",
        },
        {type: "text", kind: "verbatim", raw: "\n"},
        {type: "open", name: "greeting", attrs: ""},
        {type: "text", kind: "verbatim", raw: "Hello, world!"},
        {type: "close", name: "greeting"},
      ]);
    });
  });

  describe("errors", function() {
    it("unterminated processing instruction", function() {
      expect(onlyError("<?pi")).equals("UNTERMINATED_PI");
    });
    it("unterminated comment", function() {
      expect(onlyError("<!-- comment -")).equals("UNTERMINATED_COMMENT");
    });
    it("unterminated CDATA section", function() {
      expect(onlyError("<![CDATA[unclosed")).equals("UNTERMINATED_CDATA");
    });
    it("unterminated DOCTYPE", function() {
      expect(onlyError("<!DOCTYPE d")).equals("UNTERMINATED_DOCTYPE");
    });
    it("unterminated DOCTYPE internal subset", function() {
      expect(onlyError("<!DOCTYPE d [ <!ELEMENT d ANY>"))
        .equals("UNTERMINATED_DOCTYPE_SUBSET");
    });
    it("DOCTYPE missing '>' after the internal subset", function() {
      expect(onlyError("<!DOCTYPE d [ ]")).equals("UNTERMINATED_DOCTYPE");
    });
    it("unterminated start tag", function() {
      expect(onlyError("<a b='c'")).equals("UNTERMINATED_TAG");
    });
    it("unterminated end tag", function() {
      expect(onlyError("</a")).equals("UNTERMINATED_CLOSING_TAG");
    });
    it("empty start tag name", function() {
      expect(onlyError("<>")).equals("INVALID_TAG_NAME");
      expect(onlyError("< a>")).equals("INVALID_TAG_NAME");
      expect(onlyError("</>")).equals("INVALID_TAG_NAME");
    });
    it("empty end tag name", function() {
      expect(onlyError("</ >")).equals("INVALID_TAG_NAME");
    });
    it("throws from iteration", function() {
      expect(() => [...scan("<a>text<b")])
        .to.throw().and.have.property("code", "UNTERMINATED_TAG");
    });
    it("is exhausted after an error", function() {
      const scanner = new Scanner("<a>text<b");
      expect(scanner.next().done).to.be.false;
      expect(scanner.next().done).to.be.false;
      expect(() => scanner.next())
        .to.throw().and.have.property("code", "UNTERMINATED_TAG");
      expect(scanner.next().done).to.be.true;
      expect(scanner.next().done).to.be.true;
      expect(scanner.remaining).equals(0);
    });
  });

  it("reports the unconsumed length", function() {
    const scanner = new Scanner("<a>text</a>");
    expect(scanner.remaining).equals(11);
    scanner.next();
    expect(scanner.remaining).equals(8);
    scanner.next();
    expect(scanner.remaining).equals(4);
    scanner.next();
    expect(scanner.remaining).equals(0);
    expect(scanner.next().done).to.be.true;
  });

  it("views stay valid after the scanner moves on", function() {
    const all = [...scan("<a x='&lt;'>&amp;</a>")];
    const [open, text] = all;
    expect(all).to.have.length(3);
    expect(open?.type === "open" && open.attrs.get("x")?.decode())
      .equals("<");
    expect(text?.type === "text" && text.text.decode()).equals("&");
  });

  it("renders a document as Canonical XML", function() {
    expect(
      toCanonical(
        '<root b="2" a="1"><![CDATA[<x>]]>&amp;<!-- c --><?pi x?></root>',
      ),
    ).equals('<root a="1" b="2">&lt;x&gt;&amp;<?pi x?></root>');
  });
});
