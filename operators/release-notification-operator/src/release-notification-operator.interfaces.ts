import type { ResourceWatcher }            from '@release-notifier/k8s-operator'
import type { HelmReleaseResourceVersion } from '@release-notifier/k8s-helm-release-api'

import type { DedupLedger }                from './dedup.ledger'
import type { NotificationProvider }       from './notification-provider.interfaces'
import type { Clock }                      from './release-notification.interfaces'
import type { ReleaseEnricher }            from './release-notification.interfaces'
import type { WatcherHealthRegistry }      from './watcher-health.registry'

export interface ReleaseNotificationOperatorOptions {
  webhookUrl?: string
  namespaces: Array<string>
  apiVersion?: HelmReleaseResourceVersion
  streamTimeoutSeconds?: number
  reconnectDelayMs?: number
  watchdogIntervalMs?: number
  staleAfterMs?: number
  restartDelayMs?: number
  clusterRequestTimeoutMs?: number
  serviceVersionsLimit?: number
  clock?: Clock
  ledger?: DedupLedger
  health?: WatcherHealthRegistry
  watch?: ResourceWatcher
  enricher?: ReleaseEnricher
  provider?: NotificationProvider
}
