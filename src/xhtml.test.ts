import { parseHTML } from "linkedom";
import { describe, expect, it } from "vitest";
import { escapeAttribute, escapeXml, serializeChildren, serializeXhtml } from "./xhtml.js";

function body(html: string): HTMLElement {
  return parseHTML(`<html><head></head><body>${html}</body></html>`).document.body;
}

describe("escapeXml", () => {
  it("escapes markup characters", () => {
    expect(escapeXml("Fish & <Chips>")).toBe("Fish &amp; &lt;Chips&gt;");
  });

  it("leaves quotes in text alone", () => {
    expect(escapeXml('"quoted"')).toBe('"quoted"');
  });

  it("drops control characters XML cannot represent", () => {
    expect(escapeXml("a\u0000b\u0008c\u000Bd\u000Ce\u001Ff")).toBe("abcdef");
  });

  it("keeps tabs and line breaks", () => {
    expect(escapeXml("a\tb\nc\rd")).toBe("a\tb\nc\rd");
  });
});

describe("escapeAttribute", () => {
  it("also escapes double quotes", () => {
    expect(escapeAttribute('say "hi" & go')).toBe("say &quot;hi&quot; &amp; go");
  });
});

describe("serializeXhtml", () => {
  it("self-closes void elements", () => {
    expect(serializeChildren(body('<p>a<br>b<img src="x.png" alt=""></p>'))).toBe(
      '<p>a<br/>b<img src="x.png" alt=""/></p>',
    );
  });

  it("escapes text and attribute values", () => {
    expect(serializeChildren(body('<p title="a &quot;b&quot;">1 &lt; 2 &amp; 3</p>'))).toBe(
      '<p title="a &quot;b&quot;">1 &lt; 2 &amp; 3</p>',
    );
  });

  it("drops comments", () => {
    expect(serializeChildren(body("<p>kept<!-- dropped --></p>"))).toBe("<p>kept</p>");
  });

  it("lowercases tag names", () => {
    const element = body("<DIV><EM>x</EM></DIV>").firstChild;
    expect(element ? serializeXhtml(element) : null).toBe("<div><em>x</em></div>");
  });

  it("serializes a lone text node", () => {
    const text = body("<p>a &amp; b</p>").querySelector("p")?.firstChild;
    expect(text ? serializeXhtml(text) : null).toBe("a &amp; b");
  });

  it("strips control characters from scraped text", () => {
    const root = body("<p></p>");
    const paragraph = root.querySelector("p");
    paragraph?.appendChild(root.ownerDocument.createTextNode("bell\u0007 & form\u000Cfeed"));
    expect(serializeChildren(root)).toBe("<p>bell &amp; formfeed</p>");
  });
});
