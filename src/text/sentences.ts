/**
 * Sentence segmentation.
 *
 * The flattener only depends on the {@link SentenceSegmenter} contract; the
 * default implementation delegates boundary detection to the ICU rules behind
 * `Intl.Segmenter`.
 */

export interface SentenceSegmenter {
  /** Split normalized text into sentences, in order. Empty input yields `[]`. */
  segment(text: string): string[];
}

/** Create a segmenter backed by `Intl.Segmenter` for the given locale. */
export function createSentenceSegmenter(locale = "en"): SentenceSegmenter {
  const segmenter = new Intl.Segmenter(locale, { granularity: "sentence" });
  return {
    segment(text: string): string[] {
      const sentences: string[] = [];
      for (const { segment } of segmenter.segment(text)) {
        const sentence = segment.trim();
        if (sentence) sentences.push(sentence);
      }
      return sentences;
    },
  };
}

export const defaultSentenceSegmenter: SentenceSegmenter = createSentenceSegmenter();
