import type { ToolIndex } from '@toolscout/core'

export interface EvalCase {
  query: string
  expected: string[]
}

export interface QueryResult {
  query: string
  expected: string[]
  retrieved: string[]
  /** Expected tools found within the largest cutoff */
  matched: string[]
  /** Expected tools not found within the largest cutoff */
  missed: string[]
  reciprocalRank: number
  hit: boolean
}

export interface MetricAtK {
  k: number
  precision: number
  recall: number
}

export interface EvalReport {
  corpusSize: number
  maxK: number
  queries: QueryResult[]
  metrics: MetricAtK[]
  mrr: number
  hits: number
}

/**
 * Share of the top `k` results that are relevant. Fewer than `k` results
 * divide by the number returned.
 */
export function precisionAtK(retrieved: string[], relevant: ReadonlySet<string>, k: number): number {
  const top = retrieved.slice(0, k)
  if (top.length === 0) {
    return 0
  }
  return countRelevant(top, relevant) / top.length
}

/**
 * Share of the relevant tools found in the top `k` results
 */
export function recallAtK(retrieved: string[], relevant: ReadonlySet<string>, k: number): number {
  if (relevant.size === 0) {
    return 0
  }
  return countRelevant(retrieved.slice(0, k), relevant) / relevant.size
}

export function reciprocalRank(retrieved: string[], relevant: ReadonlySet<string>): number {
  const position = retrieved.findIndex(name => relevant.has(name))
  return position === -1 ? 0 : 1 / (position + 1)
}

/**
 * Run every case through the index. The index's topK should be at least the
 * largest cutoff.
 */
export function evaluate(index: ToolIndex, cases: EvalCase[], ks: number[]): EvalReport {
  if (cases.length === 0) {
    throw new Error('No evaluation cases provided')
  }
  if (ks.length === 0) {
    throw new Error('At least one cutoff is required')
  }

  const maxK = Math.max(...ks)
  const precisions = ks.map(() => 0)
  const recalls = ks.map(() => 0)
  const queries: QueryResult[] = []

  for (const { query, expected } of cases) {
    const relevant = new Set(expected)
    const retrieved = index.search(query)
    const topMax = new Set(retrieved.slice(0, maxK))

    ks.forEach((k, i) => {
      precisions[i] += precisionAtK(retrieved, relevant, k)
      recalls[i] += recallAtK(retrieved, relevant, k)
    })

    const matched = expected.filter(name => topMax.has(name))
    queries.push({
      query,
      expected,
      retrieved,
      matched,
      missed: expected.filter(name => !topMax.has(name)),
      reciprocalRank: reciprocalRank(retrieved, relevant),
      hit: matched.length > 0,
    })
  }

  const count = cases.length
  return {
    corpusSize: index.size,
    maxK,
    queries,
    metrics: ks.map((k, i) => ({ k, precision: precisions[i] / count, recall: recalls[i] / count })),
    mrr: queries.reduce((sum, q) => sum + q.reciprocalRank, 0) / count,
    hits: queries.filter(q => q.hit).length,
  }
}

function countRelevant(names: string[], relevant: ReadonlySet<string>): number {
  return new Set(names.filter(name => relevant.has(name))).size
}
