import { DEFAULT_SOURCE_TAG } from "../config.js";
import { plainText } from "../xml/field.js";
import { type XmlElement, findAll } from "../xml/tree.js";

/**
 * Collect `subject` terms below the `article-categories` containers into one
 * "; "-joined tag string. `sourceTag` always comes first.
 */
export function parseTags(containers: XmlElement[], sourceTag: string = DEFAULT_SOURCE_TAG): string {
  const terms = containers
    .flatMap((container) => findAll(container, "subject"))
    .map((subject) => plainText(subject.children))
    .filter(Boolean);
  return [sourceTag, ...terms].join("; ");
}
