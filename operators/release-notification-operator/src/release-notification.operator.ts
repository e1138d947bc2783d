import type { KubeConfig }                         from '@kubernetes/client-node'
import type { ResourceWatcher }                    from '@release-notifier/k8s-operator'

import { HelmReleaseResourceVersion }              from '@release-notifier/k8s-helm-release-api'
import { getHelmReleasesApiUri }                   from '@release-notifier/k8s-helm-release-api'
import { Operator }                                from '@release-notifier/k8s-operator'
import { Watch }                                   from '@release-notifier/k8s-operator'
import { delay }                                   from '@release-notifier/k8s-operator'

import type { DedupLedger }                        from './dedup.ledger'
import type { NotificationProvider }               from './notification-provider.interfaces'
import type { ReleaseNotificationOperatorOptions } from './release-notification-operator.interfaces'
import type { ReleaseEnricher }                    from './release-notification.interfaces'

import { InMemoryDedupLedger }                     from './dedup.ledger'
import { HealthWatchdog }                          from './health.watchdog'
import { MessageFormatter }                        from './message.formatter'
import { NamespaceWatcher }                        from './namespace.watcher'
import { RuntimeEnricher }                         from './runtime.enricher'
import { SlackNotificationProvider }               from './slack-notification.provider'
import { WatcherHealthRegistry }                   from './watcher-health.registry'

export class ReleaseNotificationOperator extends Operator {
  private readonly namespaces: Array<string>

  private readonly ledger: DedupLedger

  private readonly health: WatcherHealthRegistry

  private readonly watch: ResourceWatcher

  private readonly enricher: ReleaseEnricher

  private readonly provider: NotificationProvider

  private readonly formatter: MessageFormatter

  constructor(
    private readonly options: ReleaseNotificationOperatorOptions,
    kubeConfig?: KubeConfig
  ) {
    super(kubeConfig)

    if (options.provider) {
      this.provider = options.provider
    } else if (options.webhookUrl) {
      this.provider = new SlackNotificationProvider(options.webhookUrl)
    } else {
      throw new Error('Slack webhook url config required')
    }

    this.namespaces = options.namespaces
    this.ledger = options.ledger ?? new InMemoryDedupLedger()
    this.health = options.health ?? new WatcherHealthRegistry(options.clock)
    this.watch = options.watch ?? new Watch(this.kubeConfig)
    this.enricher =
      options.enricher ??
      RuntimeEnricher.fromKubeConfig(this.kubeConfig, {
        requestTimeoutMs: options.clusterRequestTimeoutMs,
      })
    this.formatter = new MessageFormatter({ serviceVersionsLimit: options.serviceVersionsLimit })
  }

  protected async init(): Promise<void> {
    this.logger.info(`Monitoring namespaces: ${this.namespaces.join(', ')}`)

    while (!this.signal.aborted) {
      try {
        // eslint-disable-next-line no-await-in-loop
        await this.runWatchLayer()
      } catch (error) {
        this.logger.error('Watch layer failed, restarting', { err: error })

        // eslint-disable-next-line no-await-in-loop
        await delay(this.options.restartDelayMs ?? 10000, this.signal)
      }
    }

    this.logger.info('Release notification operator stopped')
  }

  private async runWatchLayer(): Promise<void> {
    const layer = new AbortController()
    const abortLayer = (): void => layer.abort()

    this.signal.addEventListener('abort', abortLayer, { once: true })

    const watchdog = new HealthWatchdog(this.health, this.namespaces, {
      intervalMs: this.options.watchdogIntervalMs ?? 60000,
      staleAfterMs: this.options.staleAfterMs ?? 600000,
      clock: this.options.clock,
    })

    const watchers = this.namespaces.map(
      (namespace) =>
        new NamespaceWatcher(namespace, {
          path: getHelmReleasesApiUri(
            namespace,
            this.options.apiVersion ?? HelmReleaseResourceVersion.v2
          ),
          streamTimeoutSeconds: this.options.streamTimeoutSeconds ?? 300,
          reconnectDelayMs: this.options.reconnectDelayMs ?? 2000,
          watch: this.watch,
          ledger: this.ledger,
          health: this.health,
          enricher: this.enricher,
          formatter: this.formatter,
          provider: this.provider,
        })
    )

    const runs = [
      ...watchers.map(async (watcher) => watcher.run(layer.signal)),
      watchdog.run(layer.signal),
    ]

    try {
      await Promise.all(runs)
    } finally {
      layer.abort()
      this.signal.removeEventListener('abort', abortLayer)

      await Promise.allSettled(runs)
    }
  }
}
