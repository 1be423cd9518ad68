import type { EvalCase } from './metrics.js'
import { readFile } from 'node:fs/promises'
import { extname } from 'node:path'
import { parse as parseYaml } from 'yaml'
import { z } from 'zod'

const evalCaseSchema = z.object({
  query: z.string().min(1, 'query must not be empty'),
  expected: z.array(z.string().min(1)).min(1, 'expected must name at least one tool'),
})

const evalCasesSchema = z.union([
  z.array(evalCaseSchema),
  z.object({ cases: z.array(evalCaseSchema) }).transform(data => data.cases),
])

/**
 * Load ground-truth cases: a list of `{ query, expected }`, or an object with
 * a `cases` list, in JSON or YAML
 */
export async function loadEvalCases(filePath: string): Promise<EvalCase[]> {
  const content = await readFile(filePath, 'utf-8')
  const data: unknown = extname(filePath).toLowerCase() === '.json' ? JSON.parse(content) : parseYaml(content)

  return parseEvalCases(data, filePath)
}

export function parseEvalCases(data: unknown, source: string): EvalCase[] {
  const result = evalCasesSchema.safeParse(data)
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message)
      .join('; ')
    throw new Error(`Invalid evaluation cases in ${source}: ${issues}`)
  }
  return result.data
}
