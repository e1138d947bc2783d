#!/usr/bin/env node

import { InMemoryDedupLedger }         from '@release-notifier/release-notification-operator'
import { ReleaseNotificationOperator } from '@release-notifier/release-notification-operator'
import { Logger }                      from '@release-notifier/logger'
import { getLogLevel }                 from '@release-notifier/logger'
import { setLogLevel }                 from '@release-notifier/logger'

import { loadReleaseNotifierConfig }   from './release-notifier.config'

const logger = new Logger('ReleaseNotifier')

const bootstrap = async (): Promise<void> => {
  const config = loadReleaseNotifierConfig()

  setLogLevel(config.logLevel)

  const operator = new ReleaseNotificationOperator({
    webhookUrl: config.webhookUrl,
    namespaces: config.namespaces,
    apiVersion: config.apiVersion,
    ledger: new InMemoryDedupLedger(),
  })

  const exit = (reason: string): void => {
    logger.info(`Shutting down on ${reason}`)

    operator.stop()
  }

  process.once('SIGTERM', () => exit('SIGTERM')).once('SIGINT', () => exit('SIGINT'))

  logger.info('Release notifier starting', { logLevel: getLogLevel() })

  await operator.start()
}

bootstrap().catch((error: unknown) => {
  logger.error('Release notifier failed to start', { err: error })

  process.exit(1)
})
