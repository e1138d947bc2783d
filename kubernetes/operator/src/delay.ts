import { setTimeout as sleep } from 'node:timers/promises'

export const delay = async (ms: number, signal?: AbortSignal): Promise<void> => {
  if (signal?.aborted) {
    return
  }

  try {
    await sleep(ms, undefined, { signal })
  } catch (error) {
    if (!signal?.aborted) {
      throw error
    }
  }
}
