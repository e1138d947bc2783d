import type { ResourceEvent }         from '@release-notifier/k8s-operator'
import type { ResourceWatcher }       from '@release-notifier/k8s-operator'
import type { QueueObject }           from 'async'

import { queue }                      from 'async'

import { ResourceEventType }          from '@release-notifier/k8s-operator'
import { WatchConfigurationError }    from '@release-notifier/k8s-operator'
import { delay }                      from '@release-notifier/k8s-operator'
import { isResourceVersionExpired }   from '@release-notifier/k8s-operator'
import { Logger }                     from '@release-notifier/logger'

import type { DedupLedger }           from './dedup.ledger'
import type { MessageFormatter }      from './message.formatter'
import type { NotificationProvider }  from './notification-provider.interfaces'
import type { ReleaseEnricher }       from './release-notification.interfaces'
import type { WatcherHealthRegistry } from './watcher-health.registry'

import { NamespaceWatcherState }      from './release-notification.types'
import { extractReleaseSnapshot }     from './release-snapshot.extractor'
import { getDeduplicationKey }        from './release-snapshot.extractor'
import { isFreshDeploymentCandidate } from './release-snapshot.extractor'

export interface NamespaceWatcherOptions {
  path: string
  streamTimeoutSeconds: number
  reconnectDelayMs: number
  watch: ResourceWatcher
  ledger: DedupLedger
  health: WatcherHealthRegistry
  enricher: ReleaseEnricher
  formatter: MessageFormatter
  provider: NotificationProvider
}

export class NamespaceWatcher {
  private readonly logger = new Logger(NamespaceWatcher.name)

  private readonly eventQueue: QueueObject<ResourceEvent>

  private state = NamespaceWatcherState.Stopped

  constructor(
    public readonly namespace: string,
    private readonly options: NamespaceWatcherOptions
  ) {
    this.eventQueue = queue<ResourceEvent>(async (event) => this.handleEvent(event), 1)
  }

  getState(): NamespaceWatcherState {
    return this.state
  }

  async run(signal: AbortSignal): Promise<void> {
    this.logger.info(`Starting watch for namespace ${this.namespace}`, {
      namespace: this.namespace,
    })

    while (!signal.aborted) {
      this.transition(NamespaceWatcherState.Connecting)

      try {
        // eslint-disable-next-line no-await-in-loop
        await this.options.watch.watch(
          this.options.path,
          {
            timeoutSeconds: this.options.streamTimeoutSeconds,
            signal,
            onConnect: () => this.transition(NamespaceWatcherState.Streaming),
          },
          (event) => {
            void this.eventQueue.push(event)
          }
        )

        // eslint-disable-next-line no-await-in-loop
        await this.drainEvents()

        if (!signal.aborted) {
          this.transition(NamespaceWatcherState.Timeout)
          this.logger.debug(`Watch stream for namespace ${this.namespace} closed, reconnecting`, {
            namespace: this.namespace,
          })
        }
      } catch (error) {
        if (error instanceof WatchConfigurationError) {
          throw error
        }

        // eslint-disable-next-line no-await-in-loop
        await this.drainEvents()

        if (!signal.aborted) {
          this.handleStreamError(error)
        }
      }

      // eslint-disable-next-line no-await-in-loop
      await delay(this.options.reconnectDelayMs, signal)
    }

    await this.drainEvents()

    this.transition(NamespaceWatcherState.Stopped)
  }

  private handleStreamError(error: unknown): void {
    this.transition(NamespaceWatcherState.StreamError)

    if (isResourceVersionExpired(error)) {
      this.logger.info(`Resource version expired in namespace ${this.namespace}, restarting watch`, {
        namespace: this.namespace,
      })
    } else {
      this.logger.error(`Watch stream for namespace ${this.namespace} failed`, {
        namespace: this.namespace,
        err: error,
      })
    }

    this.transition(NamespaceWatcherState.Backoff)
  }

  private async drainEvents(): Promise<void> {
    if (!this.eventQueue.idle()) {
      await this.eventQueue.drain()
    }
  }

  private async handleEvent(event: ResourceEvent): Promise<void> {
    try {
      await this.processEvent(event)
    } catch (error) {
      this.logger.error(`Failed to process ${event.type} event in namespace ${this.namespace}`, {
        namespace: this.namespace,
        name: event.object.metadata?.name,
        err: error,
      })
    }
  }

  private async processEvent(event: ResourceEvent): Promise<void> {
    this.options.health.touch(this.namespace)

    if (event.type === ResourceEventType.Bookmark || event.type === ResourceEventType.Deleted) {
      return
    }

    const snapshot = extractReleaseSnapshot(event.object, this.namespace)

    if (!isFreshDeploymentCandidate(snapshot)) {
      return
    }

    const key = getDeduplicationKey(snapshot)

    if (!this.options.ledger.shouldProcess(key)) {
      return
    }

    this.logger.info(`New deployment detected: ${snapshot.name} in ${snapshot.namespace}`, {
      namespace: snapshot.namespace,
      name: snapshot.name,
      revision: snapshot.revision,
    })

    const enrichment = await this.options.enricher.enrich(snapshot)
    const message = this.options.formatter.formatReleaseDeployed(snapshot, enrichment)

    try {
      await this.options.provider.notify(message)

      this.logger.info(`Sent notification for ${snapshot.name} in ${snapshot.namespace}`, {
        namespace: snapshot.namespace,
        name: snapshot.name,
        revision: snapshot.revision,
      })
    } catch (error) {
      this.logger.error(`Failed to send notification for ${snapshot.name} in ${snapshot.namespace}`, {
        namespace: snapshot.namespace,
        name: snapshot.name,
        revision: snapshot.revision,
        err: error,
      })
    } finally {
      this.options.ledger.markProcessed(key)
    }
  }

  private transition(state: NamespaceWatcherState): void {
    if (this.state !== state) {
      this.logger.debug(`Namespace ${this.namespace} watcher ${this.state} -> ${state}`, {
        namespace: this.namespace,
      })

      this.state = state
    }
  }
}
