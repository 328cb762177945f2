// This benchmark also measures startup time

export interface ReadTokens {
  comments: number;
  processingInstructions: number;
  startTags: number;
  endTags: number;
  textNodes: number;
}

import fs from "fs";
import {fast_xml_parser} from "./libs/fast-xml-parser.ts";
import {lexml} from "./libs/lexml.ts";
import {sax} from "./libs/sax.ts";
import {saxes} from "./libs/saxes.ts";

function runTestCase(
  name: string,
  parse: (xml: string) => ReadTokens,
  xml: string,
  n: number,
) {
  let isError = false;
  let all = 0;
  for (let i = 0; i < n; ++i) {
    const start = performance.now();
    try {
      parse(xml);
    } catch (error) {
      console.error(name, error);
      isError = true;
    }
    all += performance.now() - start;
  }
  return [all / n, isError] as const;
}

function repeat(
  root: string,
  item: (i: number) => string,
  count: number,
  attributes = "",
) {
  let xml = `<${root}${attributes}>`;
  for (let i = 0; i < count; ++i) {
    xml += item(i);
  }
  return xml + `</${root}>`;
}

const SIZE = 50_000;

const DATASET: [string, string][] = [
  ["attributes", repeat("root", (i) => `<item id="${i}" name='item ${i}' flag="true"/>`, SIZE)],
  ["cdata", repeat("root", (i) => `<![CDATA[<raw>${i}</raw>]]>`, SIZE)],
  ["comments", repeat("root", (i) => `<!-- comment ${i} -->`, SIZE)],
  ["entities", repeat("root", (i) => `<t>${i} &lt; &#${48 + i % 10}; &amp; &#x41;</t>`, SIZE)],
  ["text", repeat("root", (i) => `<p>Lorem ipsum dolor sit amet ${i}</p>`, SIZE)],
  [
    "protocol",
    `<?xml version="1.0" encoding="UTF-8"?>` +
    repeat("protocol", (i) =>
      `<interface name="iface_${i}" version="1">` +
      `<description summary="interface ${i}">Interface body.</description>` +
      `<request name="destroy" type="destructor"/>` +
      `<event name="done"><arg name="serial" type="uint"/></event>` +
      `<enum name="error"><entry name="invalid" value="0x${i.toString(16)}"/></enum>` +
      `</interface>`, SIZE / 10, ' name="bench"'),
  ],
];

function out([time, isError]: readonly [number, boolean]) {
  return `${isError ? "✘" : "✔"} ${time.toFixed(3)}ms`;
}

function formatBytes(bytes: number) {
  if (bytes === 0) return "0 B";

  const k = 1000;
  const sizes = ["B", "kB", "MB", "GB"];
  const i = Math.floor(Math.log(bytes) / Math.log(k));

  const size = (bytes / Math.pow(k, i)).toFixed(i === 0 ? 0 : 2);

  return `${size} ${sizes[i]}`;
}

const writable = fs.createWriteStream("data.csv");
writable.write(
  "Test Case,Size,lexml,isaacs/sax-js,lddubeau/saxes,NaturalIntelligence/fast-xml-parser\n",
);
const N = 10;
for (const [name, xml] of DATASET) {
  const results = [
    runTestCase("lexml", lexml, xml, N),
    runTestCase("sax", sax, xml, N),
    runTestCase("saxes", saxes, xml, N),
    runTestCase("fast-xml-parser", fast_xml_parser, xml, N),
  ];
  writable.write(
    `${name},${formatBytes(Buffer.byteLength(xml))},${results.map(out).join(",")}\n`,
  );
}
writable.end();
