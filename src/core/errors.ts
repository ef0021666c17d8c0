/** Indicates a configuration problem detected at construction time. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigurationError'
  }
}
/** Indicates a malformed call argument, rejected before any network call is made. */
export class ClientInputError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ClientInputError'
  }
}
/** Indicates a successful response whose body does not match the expected shape. */
export class ResponseDecodeError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ResponseDecodeError'
  }
}
/** Indicates an operation was aborted via AbortSignal. */
export class AbortOperationError extends Error {
  constructor(message = 'Operation aborted') {
    super(message)
    this.name = 'AbortOperationError'
  }
}
