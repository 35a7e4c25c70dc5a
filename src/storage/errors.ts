/**
 * Raised by row stores when a read or batch write fails at the storage layer
 */
export class StorageError extends Error {
  constructor(message: string, public readonly cause?: Error) {
    super(message)
    this.name = 'StorageError'
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error))
}
