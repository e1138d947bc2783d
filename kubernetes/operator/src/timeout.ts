export class TimeoutError extends Error {
  constructor(message: string) {
    super(message)

    this.name = 'TimeoutError'
  }
}

export const withTimeout = async <T>(
  operation: Promise<T>,
  ms: number,
  message = `Operation timed out after ${ms}ms`
): Promise<T> =>
  new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(new TimeoutError(message)), ms)

    void operation.then(resolve, reject).finally(() => clearTimeout(timer))
  })
