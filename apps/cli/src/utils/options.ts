import { InvalidArgumentError } from 'commander'

/**
 * Commander argument parser for counts such as `--top-k`
 */
export function parsePositiveInt(value: string): number {
  const parsed = Number(value)
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.')
  }
  return parsed
}

/**
 * Commander parser for repeatable or variadic counts
 */
export function collectPositiveInt(value: string, previous: number[] = []): number[] {
  return [...previous, parsePositiveInt(value)]
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
