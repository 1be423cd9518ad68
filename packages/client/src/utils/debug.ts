/**
 * Sink for `[DEBUG]` lines
 */
export type DebugLogger = (message: string) => void

export const noopLogger: DebugLogger = () => {}

/**
 * Debug lines go to stderr so they never mix with program output
 */
export function createDebugLogger(enabled: boolean): DebugLogger {
  if (!enabled) {
    return noopLogger
  }
  return (message) => {
    console.error(`[DEBUG] ${message}`)
  }
}
