/**
 * BM25L tuning parameters
 */
export interface BM25Params {
  /** Term frequency saturation */
  k1: number
  /** Document length normalization */
  b: number
  /** Lower bound added to the normalized term frequency */
  delta: number
}

/**
 * Corpus statistics the scorer needs
 */
export interface BM25Stats {
  avgDocLength: number
  documentFrequencies: Map<string, number>
  totalDocuments: number
}

/**
 * Index options
 */
export interface ToolIndexOptions {
  /** Maximum number of names returned per search (default: 5) */
  topK?: number
  bm25?: Partial<BM25Params>
}

/**
 * Ranked search match
 */
export interface ToolReference {
  name: string
  description: string
  score: number
}
