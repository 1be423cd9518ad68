export type ToolScoutErrorCode
  = | 'CONFIG_ERROR'
    | 'INVALID_TOOL'
    | 'UNSUPPORTED_REQUEST'

export class ToolScoutError extends Error {
  readonly code: ToolScoutErrorCode

  constructor(code: ToolScoutErrorCode, message: string) {
    super(message)
    this.name = 'ToolScoutError'
    this.code = code
  }
}

/**
 * Invalid setup detected at construction time
 */
export class ToolIndexConfigError extends ToolScoutError {
  constructor(message: string) {
    super('CONFIG_ERROR', message)
    this.name = 'ToolIndexConfigError'
  }
}

/**
 * A tool definition that does not have the expected shape
 */
export class ToolDefinitionError extends ToolScoutError {
  readonly location: string

  constructor(location: string, message: string) {
    super('INVALID_TOOL', `Invalid tool at ${location}: ${message}`)
    this.name = 'ToolDefinitionError'
    this.location = location
  }
}

/**
 * A request option the client wrappers do not handle, such as streaming
 */
export class UnsupportedRequestError extends ToolScoutError {
  constructor(message: string) {
    super('UNSUPPORTED_REQUEST', message)
    this.name = 'UnsupportedRequestError'
  }
}
