import { describe, expect, it } from "vitest";
import { DEFAULT_SOURCE_TAG, resolveParseOptions } from "./config.js";
import { logger } from "./logger.js";
import { defaultSentenceSegmenter } from "./text/sentences.js";

describe("resolveParseOptions", () => {
  it("fills in defaults", () => {
    const options = resolveParseOptions();
    expect(options.sourceTag).toBe(DEFAULT_SOURCE_TAG);
    expect(options.sourceTag).toBe("JAMA");
    expect(options.segmenter).toBe(defaultSentenceSegmenter);
    expect(options.validate).toBe(false);
    expect(options.logger).toBe(logger);
    expect(typeof options.onError).toBe("function");
  });

  it("keeps caller-supplied values", () => {
    const segmenter = { segment: (text: string) => [text] };
    const onError = (): void => {};
    const options = resolveParseOptions({ sourceTag: "PMC", segmenter, validate: true, onError });
    expect(options.sourceTag).toBe("PMC");
    expect(options.segmenter).toBe(segmenter);
    expect(options.validate).toBe(true);
    expect(options.onError).toBe(onError);
  });
});
