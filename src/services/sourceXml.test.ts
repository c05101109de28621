import type { DocNode } from "../models/docNode";
import { SourceXmlError, parseSourceXml } from "./sourceXml";

function firstOfKind(node: DocNode, kind: DocNode["kind"]): DocNode | undefined {
  if (node.kind === kind) return node;
  if (node.kind === "text") return undefined;
  for (const child of node.children) {
    const found = firstOfKind(child, kind);
    if (found) return found;
  }
  return undefined;
}

describe("parseSourceXml", () => {
  test("builds typed nodes and drops indentation", () => {
    const doc = parseSourceXml(
      [
        "<document>",
        '  <paragraph ids="p1 p2" classes=" lead  intro ">Hi <emphasis>there</emphasis> </paragraph>',
        "</document>",
      ].join("\n"),
    );
    expect(doc).toEqual({
      kind: "document",
      attrs: {},
      children: [
        {
          kind: "paragraph",
          attrs: { ids: ["p1", "p2"], classes: ["lead", "intro"] },
          children: [
            { kind: "text", text: "Hi " },
            { kind: "emphasis", attrs: {}, children: [{ kind: "text", text: "there" }] },
            { kind: "text", text: " " },
          ],
        },
      ],
    });
  });

  test("decodes entities and keeps preformatted whitespace", () => {
    const doc = parseSourceXml(
      "<document><literal_block>  a &amp; b\n  &lt;c&gt;</literal_block></document>",
    );
    expect(firstOfKind(doc, "literal_block")).toEqual({
      kind: "literal_block",
      attrs: {},
      children: [{ kind: "text", text: "  a & b\n  <c>" }],
    });
  });

  test("reads integer and enumerated attributes", () => {
    const doc = parseSourceXml(
      "<document>" +
        '<enumerated_list enumtype="upperroman" start="3" prefix="(" suffix=")"/>' +
        '<table><tgroup><tbody><row><entry morerows="1" morecols="2"/></row></tbody></tgroup></table>' +
        "</document>",
    );
    expect(firstOfKind(doc, "enumerated_list")).toEqual({
      kind: "enumerated_list",
      attrs: { enumtype: "upperroman", start: 3, prefix: "(", suffix: ")" },
      children: [],
    });
    expect(firstOfKind(doc, "entry")).toEqual({
      kind: "entry",
      attrs: { morerows: 1, morecols: 2 },
      children: [],
    });
  });

  test("reads image, reference and option argument attributes", () => {
    const doc = parseSourceXml(
      "<document>" +
        '<image uri="a.png" alt="A"/>' +
        '<reference refuri="https://example.com/" name="site">site</reference>' +
        '<option_argument delimiter="=">N</option_argument>' +
        "</document>",
    );
    expect(firstOfKind(doc, "image")).toEqual({
      kind: "image",
      attrs: { uri: "a.png", alt: "A" },
      children: [],
    });
    expect(firstOfKind(doc, "reference")).toEqual({
      kind: "reference",
      attrs: { refuri: "https://example.com/", name: "site" },
      children: [{ kind: "text", text: "site" }],
    });
    expect(firstOfKind(doc, "option_argument")).toEqual({
      kind: "option_argument",
      attrs: { delimiter: "=" },
      children: [{ kind: "text", text: "N" }],
    });
  });

  test("unknown elements become generic nodes", () => {
    const doc = parseSourceXml('<document><system_message level="2">x</system_message></document>');
    expect(doc).toEqual({
      kind: "document",
      attrs: {},
      children: [
        {
          kind: "generic",
          name: "system_message",
          attrs: { level: "2" },
          children: [{ kind: "text", text: "x" }],
        },
      ],
    });
  });

  test("rejects attributes that are not integers", () => {
    expect(() => parseSourceXml('<document>\n<entry morerows="x"/></document>')).toThrow(
      /^attribute morerows of <entry> is not an integer: x \(line 2, column \d+\)$/,
    );
  });

  test("rejects unknown enumeration types", () => {
    expect(() => parseSourceXml('<document><enumerated_list enumtype="greek"/></document>')).toThrow(
      /unknown enumtype: greek/,
    );
  });

  test("rejects malformed XML", () => {
    expect(() => parseSourceXml("<document><paragraph>x</document>")).toThrow(SourceXmlError);
  });

  test("rejects a root other than document", () => {
    expect(() => parseSourceXml("<paragraph>x</paragraph>")).toThrow(
      /root element must be <document>, not <paragraph>/,
    );
  });

  test("rejects an empty input", () => {
    expect(() => parseSourceXml("   ")).toThrow(/no root element/);
  });
});
