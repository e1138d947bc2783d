import type { RequestOptions }       from 'node:https'

import { Agent }                     from 'node:https'

import type { KubeConfig }           from '@kubernetes/client-node'
import type { KubernetesObject }     from '@kubernetes/client-node'

import byline                        from 'byline'
import fetch                         from 'node-fetch'

import { Logger }                    from '@release-notifier/logger'

import type { ResourceEventHandler } from './operator.interfaces'
import type { ResourceWatcher }      from './operator.interfaces'
import type { WatchOptions }         from './operator.interfaces'

import { ResourceEventType }         from './operator.enums'
import { WatchConfigurationError }   from './watch.errors'
import { WatchError }                from './watch.errors'

const resourceEventTypes: ReadonlySet<string> = new Set<string>(Object.values(ResourceEventType))

const isResourceEventType = (value: unknown): value is ResourceEventType =>
  typeof value === 'string' && resourceEventTypes.has(value)

const isKubernetesObject = (value: unknown): value is KubernetesObject =>
  typeof value === 'object' && value !== null && !Array.isArray(value)

export class Watch implements ResourceWatcher {
  private readonly logger = new Logger(Watch.name)

  public constructor(private readonly kubeConfig: KubeConfig) {}

  public async watch(
    path: string,
    options: WatchOptions,
    onEvent: ResourceEventHandler
  ): Promise<void> {
    const cluster = this.kubeConfig.getCurrentCluster()

    if (!cluster) {
      throw new WatchConfigurationError('No currently active cluster')
    }

    const url = new URL(`${cluster.server}${path}`)

    url.searchParams.set('watch', 'true')

    if (options.timeoutSeconds) {
      url.searchParams.set('timeoutSeconds', String(options.timeoutSeconds))
    }

    const controller = new AbortController()
    const abort = (): void => controller.abort()

    options.signal?.addEventListener('abort', abort, { once: true })

    try {
      const requestOptions = await this.getRequestOptions()

      const response = await fetch(url.toString(), {
        method: 'GET',
        headers: requestOptions.headers,
        agent: url.protocol === 'https:' ? requestOptions.agent : undefined,
        signal: controller.signal,
      })

      if (!response.ok) {
        const message = await response
          .json()
          .then((body: unknown) =>
            typeof body === 'object' && body !== null && 'message' in body
              ? String(body.message)
              : 'Watch request error')
          .catch(() => 'Watch request error')

        throw new WatchError(`${response.statusText}: ${path} - ${message}`, {
          statusCode: response.status,
        })
      }

      options.onConnect?.()

      await new Promise<void>((resolve, reject) => {
        const stream = byline(response.body)

        stream.on('data', (line: Buffer | string) => {
          let data: unknown

          try {
            data = JSON.parse(line.toString())
          } catch {
            this.logger.warn('Skipping undecodable watch line', { path })

            return
          }

          if (typeof data !== 'object' || data === null || !('type' in data)) {
            return
          }

          const object = 'object' in data ? data.object : undefined

          if (data.type === ResourceEventType.Error) {
            reject(WatchError.fromStatus(object))
            controller.abort()

            return
          }

          if (isResourceEventType(data.type) && isKubernetesObject(object)) {
            onEvent({ type: data.type, object })
          }
        })

        response.body.on('error', reject)
        stream.on('error', reject)
        stream.on('end', resolve)
      })
    } catch (error) {
      if (options.signal?.aborted) {
        return
      }

      throw error
    } finally {
      options.signal?.removeEventListener('abort', abort)
    }
  }

  private async getRequestOptions(): Promise<{ headers: Record<string, string>; agent: Agent }> {
    const opts: RequestOptions = {}

    await this.kubeConfig.applyToHTTPSOptions(opts)

    const headers: Record<string, string> = {
      Accept: 'application/json',
    }

    if (opts.headers) {
      const authorization: unknown =
        Reflect.get(opts.headers, 'Authorization') ?? Reflect.get(opts.headers, 'authorization')

      if (typeof authorization === 'string') {
        headers.Authorization = authorization
      }
    }

    if (opts.auth) {
      headers.Authorization = `Basic ${Buffer.from(opts.auth).toString('base64')}`
    }

    const agent = new Agent({
      ca: opts.ca,
      cert: opts.cert,
      key: opts.key,
      rejectUnauthorized: opts.rejectUnauthorized,
    })

    return { headers, agent }
  }
}
