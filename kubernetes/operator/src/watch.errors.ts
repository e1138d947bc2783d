export interface WatchErrorDetails {
  statusCode?: number
  reason?: string
}

export class WatchError extends Error {
  public readonly statusCode?: number

  public readonly reason?: string

  constructor(message: string, details: WatchErrorDetails = {}) {
    super(message)

    this.name = 'WatchError'
    this.statusCode = details.statusCode
    this.reason = details.reason
  }

  static fromStatus(status: unknown): WatchError {
    if (typeof status !== 'object' || status === null) {
      return new WatchError('Watch stream reported an error')
    }

    const code = 'code' in status && typeof status.code === 'number' ? status.code : undefined
    const reason = 'reason' in status && typeof status.reason === 'string' ? status.reason : undefined
    const message =
      'message' in status && typeof status.message === 'string'
        ? status.message
        : 'Watch stream reported an error'

    return new WatchError(message, { statusCode: code, reason })
  }

  isResourceVersionExpired(): boolean {
    return this.statusCode === 410 || this.reason === 'Expired' || this.reason === 'Gone'
  }
}

export class WatchConfigurationError extends Error {
  constructor(message: string) {
    super(message)

    this.name = 'WatchConfigurationError'
  }
}

export const isResourceVersionExpired = (error: unknown): boolean =>
  error instanceof WatchError && error.isResourceVersionExpired()
