/**
 * Author and affiliation extraction from `contrib-group` and `aff` elements.
 */

import { MissingRequiredFieldError } from "../errors.js";
import { plainText } from "../xml/field.js";
import { type XmlElement, childElements, findChildren, findFirst, toElement } from "../xml/tree.js";

/** Child elements that mark the start of an affiliation's content. */
const AFFILIATION_MARKERS = new Set(["label", "sup"]);

export interface Contributors {
  /** Display names joined with "; " */
  authors: string;
  /** Affiliation texts joined with "; " */
  affiliations: string;
}

/**
 * Build a contributor display name from its name parts, e.g.
 * `<surname>Smith</surname><given-names>John</given-names>` → "Smith, John".
 */
function displayName(contrib: XmlElement, position: number): string {
  const name = findFirst(contrib, "name") ?? findFirst(contrib, "string-name");
  if (name) {
    const parts = childElements(name.children)
      .map((part) => plainText(part.children))
      .filter(Boolean);
    return parts.length > 0 ? parts.join(", ") : plainText(name.children);
  }

  const collab = findFirst(contrib, "collab");
  if (collab) return plainText(collab.children);

  throw new MissingRequiredFieldError("contrib/name", { contributor: position });
}

/** Text after the affiliation's label marker, e.g. `<label>1</label>Dept of X` → "Dept of X". */
function affiliationText(aff: XmlElement, position: number): string {
  const markerIndex = aff.children.findIndex((node) => {
    const element = toElement(node);
    return element !== undefined && AFFILIATION_MARKERS.has(element.tag);
  });
  if (markerIndex === -1) {
    throw new MissingRequiredFieldError("aff/label", { affiliation: position, id: aff.attrs["id"] });
  }

  const text = plainText(aff.children.slice(markerIndex + 1));
  if (!text) {
    throw new MissingRequiredFieldError("aff/content", { affiliation: position, id: aff.attrs["id"] });
  }
  return text;
}

/** Extract authors and affiliations, each joined with "; " in document order. */
export function parseContributors(groups: XmlElement[], affiliations: XmlElement[]): Contributors {
  const authors: string[] = [];
  for (const group of groups) {
    for (const contrib of findChildren(group, "contrib")) {
      authors.push(displayName(contrib, authors.length));
    }
  }

  return {
    authors: authors.join("; "),
    affiliations: affiliations.map((aff, i) => affiliationText(aff, i)).join("; "),
  };
}
