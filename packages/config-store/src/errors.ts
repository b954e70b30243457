export type ConfigStoreErrorCode = 'STORE_UNAVAILABLE' | 'STALE_STAGE' | 'COMMIT_FAILED'

export class ConfigStoreError extends Error {
  readonly code: ConfigStoreErrorCode

  constructor(code: ConfigStoreErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'ConfigStoreError'
    this.code = code
  }
}

/** The canonical document is missing, unreadable or not a valid document. */
export class StoreUnavailableError extends ConfigStoreError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('STORE_UNAVAILABLE', message, options)
    this.name = 'StoreUnavailableError'
  }
}

/** The canonical document changed between stage and commit. */
export class StaleStageError extends ConfigStoreError {
  constructor(message: string) {
    super('STALE_STAGE', message)
    this.name = 'StaleStageError'
  }
}

export class CommitError extends ConfigStoreError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('COMMIT_FAILED', message, options)
    this.name = 'CommitError'
  }
}
