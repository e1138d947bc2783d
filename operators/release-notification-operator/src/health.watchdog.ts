import { delay }                      from '@release-notifier/k8s-operator'
import { Logger }                     from '@release-notifier/logger'

import type { Clock }                 from './release-notification.interfaces'
import type { WatcherHealthReport }   from './release-notification.interfaces'
import type { WatcherHealthRegistry } from './watcher-health.registry'

import { WatcherHealthStatus }        from './release-notification.types'

export interface HealthWatchdogOptions {
  intervalMs: number
  staleAfterMs: number
  clock?: Clock
}

export class HealthWatchdog {
  private readonly logger = new Logger(HealthWatchdog.name)

  private readonly clock: Clock

  constructor(
    private readonly health: WatcherHealthRegistry,
    private readonly namespaces: ReadonlyArray<string>,
    private readonly options: HealthWatchdogOptions
  ) {
    this.clock = options.clock ?? Date.now
  }

  check(now: number = this.clock()): Array<WatcherHealthReport> {
    return this.namespaces.map((namespace) => {
      const report = this.inspect(namespace, now)

      if (report.status === WatcherHealthStatus.Waiting) {
        this.logger.info(`Waiting for first event in namespace ${namespace}`, { namespace })
      } else if (report.status === WatcherHealthStatus.Stale) {
        this.logger.warn(
          `No events in namespace ${namespace} for ${report.elapsedMs}ms, stream may be stuck`,
          { namespace, elapsedMs: report.elapsedMs }
        )
      } else {
        this.logger.info(`Watcher for namespace ${namespace} is healthy`, {
          namespace,
          elapsedMs: report.elapsedMs,
        })
      }

      return report
    })
  }

  async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      // eslint-disable-next-line no-await-in-loop
      await delay(this.options.intervalMs, signal)

      if (!signal.aborted) {
        this.check()
      }
    }
  }

  private inspect(namespace: string, now: number): WatcherHealthReport {
    const lastEventAt = this.health.getLastEventAt(namespace)

    if (lastEventAt === undefined) {
      return { namespace, status: WatcherHealthStatus.Waiting, elapsedMs: null }
    }

    const elapsedMs = now - lastEventAt

    return {
      namespace,
      status:
        elapsedMs > this.options.staleAfterMs
          ? WatcherHealthStatus.Stale
          : WatcherHealthStatus.Healthy,
      elapsedMs,
    }
  }
}
