/**
 * Unit tests for the XML writer.
 */

import { escapeXml } from "../../../src/serialize/escape";
import { XmlWriter } from "../../../src/serialize/xml-writer";

describe("escapeXml", () => {
  it("escapes the five special characters", () => {
    expect(escapeXml(`Tom & "Jerry" <3 'x'`)).toBe("Tom &amp; &quot;Jerry&quot; &lt;3 &apos;x&apos;");
    expect(escapeXml("a > b")).toBe("a &gt; b");
  });

  it("escapes once", () => {
    expect(escapeXml("&amp;")).toBe("&amp;amp;");
  });
});

describe("XmlWriter", () => {
  it("writes compact markup and self-closes empty elements", () => {
    const writer = new XmlWriter();
    writer.element("a", [{ name: "x", value: "1" }], () => {
      writer.text("t");
      writer.element("b", []);
    });
    expect(writer.toString()).toBe('<a x="1">t<b/></a>');
  });

  it("escapes attribute values", () => {
    const writer = new XmlWriter();
    writer.element("a", [{ name: "alias", value: 'say "hi"' }]);
    expect(writer.toString()).toBe('<a alias="say &quot;hi&quot;"/>');
  });

  it("writes a tag pair on request", () => {
    const writer = new XmlWriter(true);
    writer.element("root", [], undefined, { pair: true });
    expect(writer.toString()).toBe("<root></root>");
  });

  it("indents with tabs when pretty", () => {
    const writer = new XmlWriter(true);
    writer.element("a", [], () => {
      writer.element("b", [], () => writer.text("x"));
      writer.element("c", []);
    });
    expect(writer.toString()).toBe("<a>\n\t<b>\n\t\tx\n\t</b>\n\t<c />\n</a>");
  });

  it("writes raw markup verbatim", () => {
    const writer = new XmlWriter();
    writer.element("a", [], () => writer.raw("<x y='1'/>"));
    expect(writer.toString()).toBe("<a><x y='1'/></a>");
  });
});
