export * from './dedup.ledger'
export * from './health.watchdog'
export * from './message.formatter'
export * from './namespace.watcher'
export * from './notification-provider.interfaces'
export * from './notification.errors'
export * from './release-notification-operator.interfaces'
export * from './release-notification.interfaces'
export * from './release-notification.operator'
export * from './release-notification.types'
export * from './release-snapshot.extractor'
export * from './runtime.enricher'
export * from './runtime.utils'
export * from './slack-notification.provider'
export * from './watcher-health.registry'
