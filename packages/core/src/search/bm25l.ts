import type { BM25Params, BM25Stats } from '../types/index.js'

export const DEFAULT_BM25_PARAMS: BM25Params = {
  k1: 1.5,
  b: 0.75,
  delta: 0.5,
}

/**
 * BM25L scorer over a fixed corpus of token lists.
 *
 * Unlike plain BM25, the length-normalized term frequency is shifted by
 * `delta` before saturation, so short documents (most tool definitions) are
 * not pushed below longer ones that merely repeat a term.
 *
 * A query term that occurs anywhere in the corpus contributes a positive score
 * to every document, including documents that do not contain it. Terms absent
 * from the corpus contribute nothing.
 */
export class BM25LScorer {
  readonly params: BM25Params
  readonly stats: BM25Stats

  private readonly termFrequencies: Map<string, number>[]
  private readonly docLengths: number[]
  private readonly idf = new Map<string, number>()

  constructor(documents: string[][], params?: Partial<BM25Params>) {
    this.params = { ...DEFAULT_BM25_PARAMS, ...params }
    this.termFrequencies = documents.map(countTerms)
    this.docLengths = documents.map(doc => doc.length)
    this.stats = this.computeStats(documents)

    for (const [term, df] of this.stats.documentFrequencies) {
      this.idf.set(term, this.calculateIdf(df))
    }
  }

  /**
   * Score every document against the query tokens, in corpus order.
   * Repeated query tokens count once per occurrence.
   */
  getScores(queryTokens: string[]): number[] {
    return this.termFrequencies.map((termFreq, i) => this.calculateScore(queryTokens, termFreq, this.docLengths[i]))
  }

  /**
   * Calculate BM25L score for a single document
   */
  private calculateScore(queryTokens: string[], termFreq: Map<string, number>, docLength: number): number {
    const { k1, b, delta } = this.params
    const avgDocLength = this.stats.avgDocLength

    let score = 0

    for (const term of queryTokens) {
      const idf = this.idf.get(term)
      if (idf === undefined)
        continue

      const tf = termFreq.get(term) ?? 0

      // Length-normalized term frequency
      const ctd = tf / (1 - b + b * (docLength / avgDocLength))

      score += (idf * (k1 + 1) * (ctd + delta)) / (k1 + ctd + delta)
    }

    return score
  }

  /**
   * IDF as used by BM25L: log(N + 1) - log(df + 0.5), positive for every df <= N
   */
  private calculateIdf(df: number): number {
    return Math.log(this.stats.totalDocuments + 1) - Math.log(df + 0.5)
  }

  /**
   * Compute BM25 stats from the corpus
   */
  private computeStats(documents: string[][]): BM25Stats {
    const documentFrequencies = new Map<string, number>()
    let totalLength = 0

    for (const doc of documents) {
      totalLength += doc.length

      for (const token of new Set(doc)) {
        documentFrequencies.set(token, (documentFrequencies.get(token) ?? 0) + 1)
      }
    }

    return {
      avgDocLength: documents.length > 0 ? totalLength / documents.length : 0,
      documentFrequencies,
      totalDocuments: documents.length,
    }
  }
}

function countTerms(tokens: string[]): Map<string, number> {
  const counts = new Map<string, number>()
  for (const token of tokens) {
    counts.set(token, (counts.get(token) ?? 0) + 1)
  }
  return counts
}
