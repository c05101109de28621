import pino from "pino";
import type { DocNode } from "../models/docNode";
import { unavailableDateParser } from "../utils/dateParse";
import { ENUMERATION_STYLES } from "./nodeTable";
import { serializeHtml } from "./render";
import { parseSourceXml } from "./sourceXml";
import { translateDocument, type TranslateOptions, type VisitPhase } from "./translator";
import { StructureError } from "./traversalContext";

const logger = pino({ level: "silent" });

function translateXml(xml: string, options: TranslateOptions = {}) {
  return translateDocument(parseSourceXml(xml), { logger, ...options });
}

function article(xml: string, options: TranslateOptions = {}): string {
  return serializeHtml(translateXml(xml, options).article, { prettyPrint: false });
}

describe("translateDocument", () => {
  describe("traversal", () => {
    test("visits every node once on enter and once on leave, nested", () => {
      const xml =
        "<document><title>T</title><section><title>S</title>" +
        "<bullet_list><list_item><paragraph>a <strong>b</strong></paragraph></list_item></bullet_list>" +
        "<block_quote><paragraph>q</paragraph><attribution>who</attribution></block_quote>" +
        "</section></document>";
      const events: { phase: VisitPhase; node: DocNode; depth: number }[] = [];
      translateXml(xml, {
        onVisit: (phase, node, depth) => events.push({ phase, node, depth }),
      });

      const open: DocNode[] = [];
      const depthBefore = new Map<DocNode, number>();
      let lastDepth = 1;
      for (const e of events) {
        if (e.phase === "enter") {
          expect(depthBefore.has(e.node)).toBe(false);
          depthBefore.set(e.node, lastDepth);
          open.push(e.node);
        } else {
          expect(open.pop()).toBe(e.node);
          if (e.node.kind !== "attribution") {
            expect(e.depth).toBe(depthBefore.get(e.node));
          }
        }
        lastDepth = e.depth;
      }
      expect(open).toEqual([]);
      expect(events).toHaveLength(2 * depthBefore.size);
      expect(depthBefore.size).toBe(17);
      expect(lastDepth).toBe(1);
    });

    test("rejects a root that is not a document", () => {
      const para: DocNode = { kind: "paragraph", children: [] };
      expect(() => translateDocument(para, { logger })).toThrow(StructureError);
    });

    test("builds the html skeleton", () => {
      const { root, head, body, article } = translateXml("<document/>");
      expect(root.tag).toBe("html");
      expect(root.children).toEqual([head, body]);
      expect(body.children).toEqual([article]);
      expect(article.tag).toBe("article");
    });
  });

  describe("titles and sections", () => {
    test("sibling sections get the same heading level", () => {
      const xml =
        "<document><title>Doc</title>" +
        '<section ids="a"><title>A</title><paragraph>x</paragraph></section>' +
        '<section ids="b"><title>B</title></section></document>';
      expect(article(xml)).toBe(
        "<article><header><hgroup><h1>Doc</h1></hgroup></header>" +
          '<section id="a"><header><hgroup><h2>A</h2></hgroup></header><p>x</p></section>' +
          '<section id="b"><header><hgroup><h2>B</h2></hgroup></header></section></article>',
      );
    });

    test("top-level sections without a document title start at h1", () => {
      const xml =
        "<document><section><title>A</title>" +
        "<section><title>A.1</title></section></section>" +
        "<section><title>B</title></section></document>";
      expect(article(xml)).toBe(
        "<article><section><header><hgroup><h1>A</h1></hgroup></header>" +
          "<section><header><hgroup><h2>A.1</h2></hgroup></header></section></section>" +
          "<section><header><hgroup><h1>B</h1></hgroup></header></section></article>",
      );
    });

    test("headings deeper than six clamp to h6 with the real level", () => {
      let xml = "<document>";
      for (let i = 1; i <= 7; i++) xml += `<section><title>L${i}</title>`;
      xml += "</section>".repeat(7) + "</document>";
      const html = article(xml);
      expect(html).toContain("<h6>L6</h6>");
      expect(html).toContain('<h6 aria-level="7">L7</h6>');
    });

    test("a subtitle joins the heading group of the title", () => {
      const xml = "<document><title>T</title><subtitle>S</subtitle><paragraph>p</paragraph></document>";
      expect(article(xml)).toBe(
        "<article><header><hgroup><h1>T</h1><h2>S</h2></hgroup></header><p>p</p></article>",
      );
    });

    test("a subtitle without a title is fatal", () => {
      expect(() => translateXml("<document><subtitle>S</subtitle></document>")).toThrow(
        /subtitle without a preceding title/,
      );
    });

    test("a section closed before any title is fatal", () => {
      expect(() =>
        translateXml("<document><section><paragraph>x</paragraph></section></document>"),
      ).toThrow(StructureError);
    });

    test("titles of topics and tables do not change heading depth", () => {
      const xml =
        "<document><topic><title>Contents</title><paragraph>x</paragraph></topic>" +
        "<table><title>Numbers</title><tgroup><tbody><row><entry>1</entry></row></tbody></tgroup></table>" +
        "<section><title>S</title></section></document>";
      expect(article(xml)).toBe(
        '<article><div class="topic"><p class="topic-title">Contents</p><p>x</p></div>' +
          "<table><caption>Numbers</caption><tbody><tr><td>1</td></tr></tbody></table>" +
          "<section><header><hgroup><h1>S</h1></hgroup></header></section></article>",
      );
    });

    test("a sidebar keeps its title and subtitle to itself", () => {
      const xml =
        "<document><title>Doc</title><sidebar><title>Side</title><subtitle>Sub</subtitle>" +
        "<paragraph>x</paragraph></sidebar></document>";
      expect(article(xml)).toBe(
        "<article><header><hgroup><h1>Doc</h1></hgroup></header>" +
          '<div class="sidebar"><p class="sidebar-title">Side</p><p class="sidebar-subtitle">Sub</p>' +
          "<p>x</p></div></article>",
      );
    });

    test("a sidebar subtitle needs no document title", () => {
      const xml = "<document><sidebar><title>Side</title><subtitle>Sub</subtitle></sidebar></document>";
      expect(article(xml)).toBe(
        '<article><div class="sidebar"><p class="sidebar-title">Side</p>' +
          '<p class="sidebar-subtitle">Sub</p></div></article>',
      );
    });

    test("a topic holding only its title keeps the title element", () => {
      expect(article("<document><topic><title>Contents</title></topic></document>")).toBe(
        '<article><div class="topic"><p class="topic-title">Contents</p></div></article>',
      );
    });

    test("the document title is recorded in the summary", () => {
      const { summary } = translateXml("<document><title> My  Doc </title></document>");
      expect(summary).toEqual([{ name: "title", content: "My  Doc" }]);
    });
  });

  describe("tables", () => {
    const xml =
      '<document><table><tgroup cols="3"><colspec colwidth="1"/><colspec colwidth="1"/><colspec colwidth="1"/>' +
      "<thead><row><entry><paragraph>H</paragraph></entry>" +
      '<entry morecols="1"><paragraph>W</paragraph></entry></row></thead>' +
      '<tbody><row><entry morerows="2"><paragraph>a</paragraph></entry>' +
      "<entry><paragraph>b</paragraph></entry></row></tbody></tgroup></table></document>";

    test("header cells, data cells and spans", () => {
      expect(article(xml)).toBe(
        "<article><table><thead><tr><th>H</th><th colspan=\"2\">W</th></tr></thead>" +
          '<tbody><tr><td rowspan="3">a</td><td>b</td></tr></tbody></table></article>',
      );
    });

    test("default spans carry no attribute", () => {
      const { article: el } = translateXml(xml);
      const cell = el.children[0].children[1].children[0].children[1];
      expect(cell.tag).toBe("td");
      expect(cell.attrs).toEqual({});
    });

    test("a table nested in a header cell leaves the outer header row intact", () => {
      const nested =
        "<document><table><tgroup><thead><row>" +
        "<entry><table><tgroup><thead><row><entry>i</entry></row></thead></tgroup></table></entry>" +
        "<entry>h2</entry></row></thead>" +
        "<tbody><row><entry>d</entry><entry>e</entry></row></tbody></tgroup></table></document>";
      expect(article(nested)).toBe(
        "<article><table><thead><tr>" +
          "<th><table><thead><tr><th>i</th></tr></thead></table></th><th>h2</th></tr></thead>" +
          "<tbody><tr><td>d</td><td>e</td></tr></tbody></table></article>",
      );
    });

    test("an entry outside any row group is a data cell", () => {
      expect(article("<document><entry>x</entry></document>")).toBe("<article><td>x</td></article>");
    });
  });

  describe("enumerated lists", () => {
    test("arabic numbering has no style", () => {
      const xml =
        '<document><enumerated_list enumtype="arabic" prefix="" suffix=".">' +
        "<list_item><paragraph>one</paragraph></list_item></enumerated_list></document>";
      expect(article(xml)).toBe("<article><ol><li>one</li></ol></article>");
    });

    test("lower-alpha numbering sets the list style", () => {
      const xml =
        '<document><enumerated_list enumtype="loweralpha">' +
        "<list_item><paragraph>one</paragraph></list_item></enumerated_list></document>";
      expect(article(xml)).toBe(
        '<article><ol style="list-style-type: lower-alpha"><li>one</li></ol></article>',
      );
    });

    test("a start other than one is kept", () => {
      const xml = '<document><enumerated_list start="3"><list_item/></enumerated_list></document>';
      expect(article(xml)).toBe('<article><ol start="3"><li></li></ol></article>');
    });

    test("each non-arabic style is distinct", () => {
      const styles = [
        ENUMERATION_STYLES.loweralpha,
        ENUMERATION_STYLES.upperalpha,
        ENUMERATION_STYLES.lowerroman,
        ENUMERATION_STYLES.upperroman,
      ];
      expect(new Set(styles).size).toBe(4);
      expect(ENUMERATION_STYLES.upperroman).toBe("list-style-type: upper-roman");
      expect(ENUMERATION_STYLES.arabic).toBeUndefined();
    });
  });

  describe("block quotes", () => {
    test("attribution becomes a caption beside the quoted body", () => {
      const xml =
        "<document><block_quote><paragraph>Quoted</paragraph>" +
        "<attribution>Someone</attribution></block_quote></document>";
      expect(article(xml)).toBe(
        '<article><figure class="quote"><blockquote>Quoted</blockquote>' +
          "<figcaption>Someone</figcaption></figure></article>",
      );
    });

    test("a quote without attribution keeps only the body", () => {
      const xml = "<document><block_quote><paragraph>a</paragraph><paragraph>b</paragraph></block_quote></document>";
      expect(article(xml)).toBe(
        '<article><figure class="quote"><blockquote><p>a</p><p>b</p></blockquote></figure></article>',
      );
    });

    test("nested quotes close in order", () => {
      const xml =
        "<document><block_quote><block_quote><paragraph>in</paragraph>" +
        "<attribution>A</attribution></block_quote><attribution>B</attribution></block_quote></document>";
      expect(article(xml)).toBe(
        '<article><figure class="quote"><blockquote><figure class="quote"><blockquote>in</blockquote>' +
          "<figcaption>A</figcaption></figure></blockquote><figcaption>B</figcaption></figure></article>",
      );
    });

    test("attribution outside a quote is fatal", () => {
      expect(() => translateXml("<document><attribution>x</attribution></document>")).toThrow(
        /attribution outside a block quote/,
      );
    });
  });

  describe("metadata", () => {
    const xml = "<document><docinfo><author>Jane Doe</author><date>2009-10-05</date></docinfo></document>";

    test("a parsed date gets a machine-readable timestamp", () => {
      const result = translateXml(xml);
      expect(serializeHtml(result.article, { prettyPrint: false })).toBe(
        "<article><header itemscope><table><tbody>" +
          '<tr><th>Author</th><td itemprop="author">Jane Doe</td></tr>' +
          '<tr><th>Date</th><td itemprop="date"><time datetime="2009-10-05T00:00:00">2009-10-05</time></td></tr>' +
          "</tbody></table></header></article>",
      );
      expect(result.summary).toEqual([
        { name: "author", content: "Jane Doe" },
        { name: "date", content: "2009-10-05T00:00:00" },
      ]);
    });

    test("without a date parser only the text remains", () => {
      const result = translateXml(xml, { parseDate: unavailableDateParser });
      expect(serializeHtml(result.article, { prettyPrint: false })).toContain(
        '<td itemprop="date"><time>2009-10-05</time></td>',
      );
      expect(result.summary[1]).toEqual({ name: "date", content: "2009-10-05" });
    });

    test("an unparseable date is not fatal", () => {
      const result = translateXml("<document><docinfo><date>someday</date></docinfo></document>");
      expect(serializeHtml(result.article, { prettyPrint: false })).toContain(
        '<td itemprop="date"><time>someday</time></td>',
      );
    });

    test("other date parser failures propagate", () => {
      const parseDate = () => {
        throw new TypeError("broken");
      };
      expect(() => translateXml(xml, { parseDate })).toThrow(TypeError);
    });

    test("fields share the header of their section", () => {
      const result = translateXml(
        "<document><title>T</title><docinfo><version>1.0</version><status>draft</status></docinfo></document>",
      );
      expect(serializeHtml(result.article, { prettyPrint: false })).toBe(
        "<article><header itemscope><hgroup><h1>T</h1></hgroup><table><tbody>" +
          '<tr><th>Version</th><td itemprop="version">1.0</td></tr>' +
          '<tr><th>Status</th><td itemprop="status">draft</td></tr>' +
          "</tbody></table></header></article>",
      );
      expect(result.summary.map((e) => e.name)).toEqual(["title", "version", "status"]);
    });
  });

  describe("line blocks", () => {
    test("nested lines are indented and each ends with one break", () => {
      const xml =
        "<document><line_block><line>first</line>" +
        "<line_block><line>second</line></line_block></line_block></document>";
      const { article: el } = translateXml(xml);
      expect(el.text).toBe("first");
      expect(el.children.map((c) => c.tag)).toEqual(["br", "br"]);
      expect(el.children[0].tail).toBe("\u00a0".repeat(4) + "second");
      expect(el.children[1].tail).toBe("");
    });
  });

  describe("unknown nodes", () => {
    const xml = "<document><field_list><paragraph>x</paragraph></field_list></document>";

    test("are fatal in strict mode", () => {
      expect(() => translateXml(xml)).toThrow(/no translation for node "field_list"/);
    });

    test("pass through in lenient mode", () => {
      expect(article(xml, { strictNodeKinds: false })).toBe("<article>x</article>");
    });
  });
});
