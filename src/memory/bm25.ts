/**
 * Okapi BM25 over a fixed corpus.
 *
 * The model is built once per corpus and discarded; callers rebuild it when
 * the documents change. IDF uses the `ln(1 + (N - n + 0.5) / (n + 0.5))`
 * form, which stays positive for every term that occurs in the corpus, so a
 * matching document never scores zero even in a two-document corpus.
 */

export interface BM25Config {
  /** Term frequency saturation. */
  k1: number;
  /** Document length normalization. */
  b: number;
}

export const DEFAULT_BM25_CONFIG: BM25Config = {
  k1: 1.5,
  b: 0.75,
};

/** Case-folded whitespace split. No stemming and no stop words. */
export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/\s+/)
    .filter((token) => token.length > 0);
}

export class BM25Model {
  private readonly config: BM25Config;
  private readonly termFrequencies: Map<string, number>[];
  private readonly lengths: number[];
  private readonly documentFrequency = new Map<string, number>();
  private readonly avgLength: number;

  constructor(corpus: string[][], config: Partial<BM25Config> = {}) {
    this.config = { ...DEFAULT_BM25_CONFIG, ...config };
    this.lengths = corpus.map((tokens) => tokens.length);
    this.termFrequencies = corpus.map((tokens) => {
      const tf = new Map<string, number>();
      for (const token of tokens) {
        tf.set(token, (tf.get(token) ?? 0) + 1);
      }
      for (const term of tf.keys()) {
        this.documentFrequency.set(term, (this.documentFrequency.get(term) ?? 0) + 1);
      }
      return tf;
    });
    const total = this.lengths.reduce((sum, length) => sum + length, 0);
    this.avgLength = corpus.length > 0 ? total / corpus.length : 0;
  }

  get size(): number {
    return this.lengths.length;
  }

  idf(term: string): number {
    const n = this.documentFrequency.get(term) ?? 0;
    if (n === 0) return 0;
    const N = this.size;
    return Math.log(1 + (N - n + 0.5) / (n + 0.5));
  }

  /** One score per document, in corpus order. */
  scores(queryTokens: string[]): number[] {
    const { k1, b } = this.config;
    return this.termFrequencies.map((tf, index) => {
      const lengthNorm =
        this.avgLength > 0 ? 1 - b + (b * this.lengths[index]) / this.avgLength : 1;
      let score = 0;
      for (const term of queryTokens) {
        const freq = tf.get(term);
        if (!freq) continue;
        score += (this.idf(term) * (freq * (k1 + 1))) / (freq + k1 * lengthNorm);
      }
      return score;
    });
  }
}
