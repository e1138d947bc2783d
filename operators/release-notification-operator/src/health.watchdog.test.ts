import { Logger }                from '@release-notifier/logger'

import { HealthWatchdog }        from './health.watchdog'
import { WatcherHealthStatus }   from './release-notification.types'
import { WatcherHealthRegistry } from './watcher-health.registry'

describe('health.watchdog', () => {
  let warn: jest.SpyInstance

  beforeEach(() => {
    jest.spyOn(Logger.prototype, 'info').mockImplementation(() => undefined)
    warn = jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined)
  })

  afterEach(() => {
    jest.restoreAllMocks()
  })

  const createWatchdog = (health: WatcherHealthRegistry): HealthWatchdog =>
    new HealthWatchdog(health, ['production', 'staging'], {
      intervalMs: 60000,
      staleAfterMs: 600000,
    })

  it('should report waiting before first event', () => {
    const watchdog = createWatchdog(new WatcherHealthRegistry())

    expect(watchdog.check(1000)).toEqual([
      { namespace: 'production', status: WatcherHealthStatus.Waiting, elapsedMs: null },
      { namespace: 'staging', status: WatcherHealthStatus.Waiting, elapsedMs: null },
    ])
  })

  it('should flag stale namespace and recover after fresh event', () => {
    const health = new WatcherHealthRegistry()
    const watchdog = createWatchdog(health)

    health.touch('production', 0)
    health.touch('staging', 500000)

    expect(watchdog.check(600001)).toEqual([
      { namespace: 'production', status: WatcherHealthStatus.Stale, elapsedMs: 600001 },
      { namespace: 'staging', status: WatcherHealthStatus.Healthy, elapsedMs: 100001 },
    ])
    expect(warn).toHaveBeenCalledTimes(1)

    health.touch('production', 600001)

    expect(watchdog.check(600002)[0]).toEqual({
      namespace: 'production',
      status: WatcherHealthStatus.Healthy,
      elapsedMs: 1,
    })
  })

  it('should not flag namespace exactly at threshold', () => {
    const health = new WatcherHealthRegistry()

    health.touch('production', 0)

    expect(createWatchdog(health).check(600000)[0].status).toBe(WatcherHealthStatus.Healthy)
  })

  it('should check periodically until aborted', async () => {
    const health = new WatcherHealthRegistry(() => 0)
    const watchdog = new HealthWatchdog(health, ['production'], {
      intervalMs: 1,
      staleAfterMs: 600000,
      clock: () => 0,
    })
    const controller = new AbortController()
    let checks = 0

    const check = jest.spyOn(watchdog, 'check').mockImplementation(() => {
      checks += 1

      if (checks >= 2) {
        controller.abort()
      }

      return []
    })

    await watchdog.run(controller.signal)

    expect(check).toHaveBeenCalledTimes(2)
  })

  it('should read last event time from clock', () => {
    const health = new WatcherHealthRegistry(() => 42)

    health.touch('production')

    expect(health.getLastEventAt('production')).toBe(42)
    expect(health.getLastEventAt('staging')).toBeUndefined()
  })
})
