/**
 * @jest-environment node
 */

import type { ResourceEvent }          from '@release-notifier/k8s-operator'
import type { ResourceEventHandler }   from '@release-notifier/k8s-operator'
import type { ResourceWatcher }        from '@release-notifier/k8s-operator'
import type { WatchOptions }           from '@release-notifier/k8s-operator'
import type { HelmReleaseResource }    from '@release-notifier/k8s-helm-release-api'

import { KubeConfig }                  from '@kubernetes/client-node'

import { ResourceEventType }           from '@release-notifier/k8s-operator'
import { WatchConfigurationError }     from '@release-notifier/k8s-operator'
import { Logger }                      from '@release-notifier/logger'

import type { NotificationMessage }    from '../src'
import type { ReleaseEnrichment }      from '../src'
import type { ReleaseSnapshot }        from '../src'

import { InMemoryDedupLedger }         from '../src'
import { ReleaseNotificationOperator } from '../src'

jest.setTimeout(30000)

type WatchSession = Array<ResourceEvent> | Error

class NamespacedScriptedWatch implements ResourceWatcher {
  private readonly pending: Set<string>

  private resolveExhausted: () => void = () => undefined

  public readonly exhausted: Promise<void>

  constructor(private readonly sessions: Record<string, Array<WatchSession>>) {
    this.pending = new Set(Object.keys(sessions))
    this.exhausted = new Promise((resolve) => {
      this.resolveExhausted = resolve
    })
  }

  async watch(path: string, options: WatchOptions, onEvent: ResourceEventHandler): Promise<void> {
    const namespace = path.split('/')[5]
    const session = this.sessions[namespace]?.shift()

    if (!session) {
      this.pending.delete(namespace)

      if (this.pending.size === 0) {
        this.resolveExhausted()
      }

      await new Promise<void>((resolve) => {
        if (options.signal?.aborted) {
          resolve()
        } else {
          options.signal?.addEventListener('abort', () => resolve(), { once: true })
        }
      })

      return
    }

    options.onConnect?.()

    if (session instanceof Error) {
      throw session
    }

    session.forEach(onEvent)
  }
}

const createKubeConfig = (): KubeConfig => {
  const kubeConfig = new KubeConfig()

  kubeConfig.loadFromOptions({
    clusters: [{ name: 'test', server: 'https://cluster.test', skipTLSVerify: false }],
    users: [{ name: 'test', token: 'test-token' }],
    contexts: [{ name: 'test', cluster: 'test', user: 'test' }],
    currentContext: 'test',
  })

  return kubeConfig
}

const releaseEvent = (
  namespace: string,
  name: string,
  revision: string,
  ready?: 'True'
): ResourceEvent => {
  const object: HelmReleaseResource = {
    apiVersion: 'helm.toolkit.fluxcd.io/v2',
    kind: 'HelmRelease',
    metadata: { name, namespace },
    spec: { chart: { spec: { chart: name, version: '1.3.1' } } },
    status: {
      lastAppliedRevision: revision,
      conditions: ready ? [{ type: 'Ready', status: ready }] : [],
    },
  }

  return { type: ResourceEventType.Modified, object }
}

const enrichment: ReleaseEnrichment = {
  serviceVersions: [{ name: 'checkout', image: 'ghcr.io/acme/checkout', tag: '1.4.0' }],
  dependencies: [],
  replicas: { desired: 2, ready: 2 },
}

describe('release-notification.operator', () => {
  let notify: jest.Mock<Promise<void>, [NotificationMessage]>
  let enrich: jest.Mock<Promise<ReleaseEnrichment>, [ReleaseSnapshot]>

  const notifiedReleases = (): Array<string> =>
    notify.mock.calls.map(([message]) => message.text)

  beforeEach(() => {
    jest.spyOn(Logger.prototype, 'debug').mockImplementation(() => undefined)
    jest.spyOn(Logger.prototype, 'info').mockImplementation(() => undefined)
    jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined)
    jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined)

    notify = jest.fn<Promise<void>, [NotificationMessage]>()
    notify.mockResolvedValue(undefined)
    enrich = jest.fn<Promise<ReleaseEnrichment>, [ReleaseSnapshot]>()
    enrich.mockResolvedValue(enrichment)
  })

  afterEach(() => {
    jest.restoreAllMocks()
  })

  it('should require notification target', () => {
    expect(() => new ReleaseNotificationOperator({ namespaces: ['production'] }, createKubeConfig())).toThrow(
      'Slack webhook url config required'
    )
  })

  it('should notify once per release revision', async () => {
    const watch = new NamespacedScriptedWatch({
      production: [
        [releaseEvent('production', 'checkout', '7')],
        [releaseEvent('production', 'checkout', '7', 'True')],
        [releaseEvent('production', 'checkout', '7', 'True')],
        [releaseEvent('production', 'checkout', '8', 'True')],
      ],
      staging: [[releaseEvent('staging', 'checkout', '8', 'True')]],
    })

    const operator = new ReleaseNotificationOperator(
      {
        namespaces: ['production', 'staging'],
        reconnectDelayMs: 0,
        watch,
        enricher: { enrich },
        provider: { notify },
      },
      createKubeConfig()
    )

    const running = operator.start()

    await watch.exhausted

    operator.stop()

    await running

    expect(notifiedReleases().sort()).toEqual([
      '✅ checkout deployed to production (revision 7)',
      '✅ checkout deployed to production (revision 8)',
      '✅ checkout deployed to staging (revision 8)',
    ])
    expect(enrich).toHaveBeenCalledTimes(3)
  })

  it('should restart watch layer and keep processed revisions', async () => {
    const ledger = new InMemoryDedupLedger()

    const watch = new NamespacedScriptedWatch({
      production: [
        [releaseEvent('production', 'checkout', '7', 'True')],
        new WatchConfigurationError('No currently active cluster'),
        [releaseEvent('production', 'checkout', '7', 'True')],
        [releaseEvent('production', 'checkout', '9', 'True')],
      ],
    })

    const operator = new ReleaseNotificationOperator(
      {
        namespaces: ['production'],
        reconnectDelayMs: 0,
        restartDelayMs: 0,
        ledger,
        watch,
        enricher: { enrich },
        provider: { notify },
      },
      createKubeConfig()
    )

    const running = operator.start()

    await watch.exhausted

    operator.stop()

    await running

    expect(notifiedReleases()).toEqual([
      '✅ checkout deployed to production (revision 7)',
      '✅ checkout deployed to production (revision 9)',
    ])
    expect(ledger.size).toBe(2)
    expect(Logger.prototype.error).toHaveBeenCalledWith(
      'Watch layer failed, restarting',
      expect.objectContaining({ err: expect.any(WatchConfigurationError) })
    )
  })

  it('should deliver namespace while another namespace hangs', async () => {
    let releaseStaging: () => void = () => undefined
    let productionNotified: () => void = () => undefined

    const stagingGate = new Promise<void>((resolve) => {
      releaseStaging = resolve
    })
    const productionDelivered = new Promise<void>((resolve) => {
      productionNotified = resolve
    })

    enrich.mockImplementation(async (snapshot) => {
      if (snapshot.namespace === 'staging') {
        await stagingGate
      }

      return enrichment
    })
    notify.mockImplementation(async (message) => {
      if (message.text.includes('production')) {
        productionNotified()
      }
    })

    const watch = new NamespacedScriptedWatch({
      staging: [[releaseEvent('staging', 'checkout', '8', 'True')]],
      production: [[releaseEvent('production', 'checkout', '7', 'True')]],
    })

    const operator = new ReleaseNotificationOperator(
      {
        namespaces: ['staging', 'production'],
        reconnectDelayMs: 0,
        watch,
        enricher: { enrich },
        provider: { notify },
      },
      createKubeConfig()
    )

    const running = operator.start()

    await productionDelivered

    expect(notifiedReleases()).toEqual(['✅ checkout deployed to production (revision 7)'])
    expect(enrich).toHaveBeenCalledWith(expect.objectContaining({ namespace: 'staging' }))

    releaseStaging()

    await watch.exhausted

    operator.stop()

    await running

    expect(notifiedReleases()).toEqual([
      '✅ checkout deployed to production (revision 7)',
      '✅ checkout deployed to staging (revision 8)',
    ])
  })
})
