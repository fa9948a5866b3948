import { describe, expect, it } from "vitest";
import { MissingRequiredFieldError } from "../errors.js";
import type { SentenceSegmenter } from "../text/sentences.js";
import { type XmlElement, childElements, findFirst, parseXml } from "../xml/tree.js";
import { flattenSections, sectionName } from "./sections.js";

function partsOf(xml: string): { abstract?: XmlElement; body?: XmlElement } {
  const [root] = childElements(parseXml(xml));
  if (!root) throw new Error("no root element");
  const abstract = findFirst(root, "abstract");
  const body = findFirst(root, "body");
  return { ...(abstract ? { abstract } : {}), ...(body ? { body } : {}) };
}

function flatten(title: string | undefined, xml: string, segmenter?: SentenceSegmenter) {
  const { abstract, body } = partsOf(xml);
  return flattenSections(title, abstract, body, segmenter).map((s) => [s.name, s.text]);
}

describe("sectionName", () => {
  it("joins path parts with a backslash", () => {
    expect(sectionName("METHODS", "STUDY DESIGN")).toBe("METHODS\\STUDY DESIGN");
    expect(sectionName("RESULTS")).toBe("RESULTS");
  });
});

describe("flattenSections", () => {
  it("orders title, abstract sections, flat and nested body sections", () => {
    const sections = flatten(
      "Study of X",
      `<article>
        <abstract>
          <sec><title>Importance</title><p>Why it matters.</p></sec>
          <sec><title>Objective</title><p>To test X.</p><p>And Y.</p></sec>
        </abstract>
        <body>
          <sec><title>Introduction</title><p>First point. Second point.</p></sec>
          <sec>
            <title>Methods</title>
            <sec><title>Study Design</title><p>A cohort study.</p></sec>
            <sec><title>Statistical Analysis</title><p>We used models. Tests were two-sided.</p></sec>
          </sec>
        </body>
      </article>`
    );
    expect(sections).toEqual([
      ["TITLE", "Study of X"],
      ["ABSTRACT\\Importance", "Why it matters."],
      ["ABSTRACT\\Objective", "To test X. And Y."],
      ["INTRODUCTION", "First point."],
      ["INTRODUCTION", "Second point."],
      ["METHODS\\STUDY DESIGN", "A cohort study."],
      ["METHODS\\STATISTICAL ANALYSIS", "We used models."],
      ["METHODS\\STATISTICAL ANALYSIS", "Tests were two-sided."],
    ]);
  });

  it("keeps the full title unsegmented", () => {
    expect(flatten("First part. Second part.", "<article/>")).toEqual([
      ["TITLE", "First part. Second part."],
    ]);
  });

  it("omits the title entry when there is no title", () => {
    expect(flatten(undefined, "<article><body><sec><title>Results</title><p>Done.</p></sec></body></article>")).toEqual([
      ["RESULTS", "Done."],
    ]);
  });

  it("ignores abstracts without sections", () => {
    expect(
      flatten("T", "<article><abstract><p>Plain abstract text. More text.</p></abstract></article>")
    ).toEqual([["TITLE", "T"]]);
  });

  it("cleans paragraph text before splitting", () => {
    expect(
      flatten(
        undefined,
        `<article><body><sec><title>
          Key   Points
        </title><p>Line one
          continues. Line two.</p></sec></body></article>`
      )
    ).toEqual([
      ["KEY POINTS", "Line one continues."],
      ["KEY POINTS", "Line two."],
    ]);
  });

  it("contributes nothing for sections without paragraphs", () => {
    expect(
      flatten(
        undefined,
        `<article>
          <abstract><sec><title>Empty</title></sec></abstract>
          <body>
            <sec><title>Empty</title></sec>
            <sec><title>Parent</title><sec><title>Empty Child</title></sec></sec>
            <sec><title>Results</title><p>Done.</p></sec>
          </body>
        </article>`
      )
    ).toEqual([["RESULTS", "Done."]]);
  });

  it("drops a parent's own paragraphs when it has subsections", () => {
    expect(
      flatten(
        undefined,
        `<article><body>
          <sec>
            <title>Discussion</title>
            <p>Parent text.</p>
            <sec><title>Limitations</title><p>Small sample.</p></sec>
          </sec>
        </body></article>`
      )
    ).toEqual([["DISCUSSION\\LIMITATIONS", "Small sample."]]);
  });

  it("uses the injected segmenter", () => {
    const whole: SentenceSegmenter = { segment: (text) => (text ? [text] : []) };
    expect(
      flatten(
        undefined,
        "<article><body><sec><title>Results</title><p>One. Two.</p><p>Three.</p></sec></body></article>",
        whole
      )
    ).toEqual([["RESULTS", "One. Two. Three."]]);
  });

  it("fails on a body section without a title", () => {
    expect(() => flatten("T", "<article><body><sec><p>No title.</p></sec></body></article>")).toThrow(
      MissingRequiredFieldError
    );
  });

  it("reports the parent path of an untitled subsection", () => {
    try {
      flatten(
        "T",
        "<article><body><sec><title>Methods</title><sec><p>Orphan.</p></sec></sec></body></article>"
      );
      expect.unreachable("expected a MissingRequiredFieldError");
    } catch (error) {
      expect(error).toBeInstanceOf(MissingRequiredFieldError);
      if (error instanceof MissingRequiredFieldError) {
        expect(error.field).toBe("sec/title");
        expect(error.context["path"]).toBe("METHODS");
      }
    }
  });

  it("fails on an abstract section without a title", () => {
    expect(() =>
      flatten("T", "<article><abstract><sec><p>Untitled.</p></sec></abstract></article>")
    ).toThrow("Missing required field: sec/title");
  });
});
