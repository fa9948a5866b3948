import { describe, expect, it } from "vitest";
import { getField, plainText } from "./field.js";
import { type XmlElement, childElements, parseXml } from "./tree.js";

function rootOf(xml: string): XmlElement {
  const [root] = childElements(parseXml(xml));
  if (!root) throw new Error("no root element");
  return root;
}

const ARTICLE = rootOf(`
<article>
  <back>
    <ref-list>
      <ref><element-citation><article-title>Cited Work</article-title></element-citation></ref>
    </ref-list>
  </back>
  <front>
    <journal-meta><journal-title/></journal-meta>
    <article-meta>
      <article-id pub-id-type="doi">10.1001/example.2020.0001</article-id>
      <title-group>
        <article-title>
          Effect of <italic>Drug A</italic>
          on Outcomes
        </article-title>
      </title-group>
    </article-meta>
  </front>
</article>`);

describe("getField", () => {
  it("returns the cleaned text of the first match", () => {
    expect(getField(ARTICLE, "article-id")).toBe("10.1001/example.2020.0001");
  });

  it("matches the first descendant in document order", () => {
    expect(getField(ARTICLE, "article-title")).toBe("Cited Work");
  });

  it("restricts matches to the given parent chain", () => {
    expect(getField(ARTICLE, "title-group/article-title")).toBe("Effect of Drug A on Outcomes");
    expect(getField(ARTICLE, "article-meta/title-group/article-title")).toBe(
      "Effect of Drug A on Outcomes"
    );
    expect(getField(ARTICLE, "ref/article-title")).toBeUndefined();
  });

  it("returns undefined when nothing matches", () => {
    expect(getField(ARTICLE, "pub-date")).toBeUndefined();
    expect(getField(ARTICLE, "")).toBeUndefined();
  });

  it("returns an empty string for an element without text", () => {
    expect(getField(ARTICLE, "journal-title")).toBe("");
  });
});

describe("plainText", () => {
  it("strips escaped inline markup and cleans whitespace", () => {
    const root = rootOf("<surname>\n  &lt;i&gt;Smith&lt;/i&gt;\n</surname>");
    expect(plainText(root.children)).toBe("Smith");
  });
});
