import type { KubeConfig }         from '@kubernetes/client-node'
import type { V1Deployment }       from '@kubernetes/client-node'
import type { V1Pod }              from '@kubernetes/client-node'
import type { V1PodList }          from '@kubernetes/client-node'

import { AppsV1Api }               from '@kubernetes/client-node'
import { CoreV1Api }               from '@kubernetes/client-node'
import { HttpError }               from '@kubernetes/client-node'

import type { LogAttributes }      from '@release-notifier/logger'

import { withTimeout }             from '@release-notifier/k8s-operator'
import { Logger }                  from '@release-notifier/logger'

import type { ChartDependency }    from './release-notification.interfaces'
import type { DeploymentReplicas } from './release-notification.interfaces'
import type { ReleaseEnricher }    from './release-notification.interfaces'
import type { ReleaseEnrichment }  from './release-notification.interfaces'
import type { ReleaseSnapshot }    from './release-notification.interfaces'
import type { ServiceVersion }     from './release-notification.interfaces'

import { PodLabel }                from './release-notification.types'
import { UNKNOWN_VALUE }           from './release-snapshot.extractor'
import { parseChartLabel }         from './runtime.utils'
import { toServiceVersion }        from './runtime.utils'

export interface PodReader {
  listNamespacedPod(
    namespace: string,
    pretty?: string,
    allowWatchBookmarks?: boolean,
    _continue?: string,
    fieldSelector?: string,
    labelSelector?: string
  ): Promise<{ body: V1PodList }>
}

export interface DeploymentReader {
  readNamespacedDeployment(name: string, namespace: string): Promise<{ body: V1Deployment }>
}

const describeError = (error: unknown): LogAttributes => {
  if (error instanceof HttpError) {
    return {
      statusCode: error.statusCode,
      message: typeof error.body?.message === 'string' ? error.body.message : error.message,
    }
  }

  return { err: error }
}

export interface RuntimeEnricherOptions {
  requestTimeoutMs?: number
}

export class RuntimeEnricher implements ReleaseEnricher {
  private readonly logger = new Logger(RuntimeEnricher.name)

  private readonly requestTimeoutMs: number

  constructor(
    private readonly podReader: PodReader,
    private readonly deploymentReader: DeploymentReader,
    options: RuntimeEnricherOptions = {}
  ) {
    this.requestTimeoutMs = options.requestTimeoutMs ?? 10000
  }

  static fromKubeConfig(
    kubeConfig: KubeConfig,
    options: RuntimeEnricherOptions = {}
  ): RuntimeEnricher {
    return new RuntimeEnricher(
      kubeConfig.makeApiClient(CoreV1Api),
      kubeConfig.makeApiClient(AppsV1Api),
      options
    )
  }

  async enrich(snapshot: ReleaseSnapshot): Promise<ReleaseEnrichment> {
    const { namespace, name, chartName } = snapshot

    const [serviceVersions, dependencies, replicas] = await Promise.all([
      this.listServiceVersions(namespace, name),
      this.listDependencies(namespace, name, chartName === UNKNOWN_VALUE ? undefined : chartName),
      this.getDeploymentReplicas(namespace, name),
    ])

    return { serviceVersions, dependencies, replicas }
  }

  async listServiceVersions(namespace: string, releaseName: string): Promise<Array<ServiceVersion>> {
    const pods = await this.listPodsWithFallback(namespace, releaseName)
    const versions = new Map<string, ServiceVersion>()

    pods.forEach((pod) => {
      pod.spec?.containers.forEach((container) => {
        if (container.image) {
          const version = toServiceVersion(container.image)

          versions.set(version.name, version)
        }
      })
    })

    return Array.from(versions.values())
  }

  async listDependencies(
    namespace: string,
    releaseName: string,
    chartName?: string
  ): Promise<Array<ChartDependency>> {
    let pods: Array<V1Pod>

    try {
      pods = await this.listReleasePods(namespace, releaseName)
    } catch (error) {
      this.logger.error(`Failed to list pods of release ${releaseName} in ${namespace}`, describeError(error))

      return []
    }

    const excluded = new Set([releaseName, chartName])
    const dependencies = new Map<string, ChartDependency>()

    pods.forEach((pod) => {
      const label = pod.metadata?.labels?.[PodLabel.Chart]
      const dependency = label ? parseChartLabel(label) : null

      if (dependency && !excluded.has(dependency.name)) {
        dependencies.set(dependency.name, dependency)
      }
    })

    return Array.from(dependencies.values()).sort((a, b) => a.name.localeCompare(b.name))
  }

  async getDeploymentReplicas(
    namespace: string,
    releaseName: string
  ): Promise<DeploymentReplicas | null> {
    try {
      const { body } = await withTimeout(
        this.deploymentReader.readNamespacedDeployment(releaseName, namespace),
        this.requestTimeoutMs,
        `Reading deployment ${releaseName} timed out after ${this.requestTimeoutMs}ms`
      )

      return {
        desired: body.spec?.replicas ?? 0,
        ready: body.status?.readyReplicas ?? 0,
      }
    } catch (error) {
      this.logger.warn(`Failed to read deployment ${releaseName} in ${namespace}`, describeError(error))

      return null
    }
  }

  private async listReleasePods(namespace: string, releaseName: string): Promise<Array<V1Pod>> {
    const { body } = await withTimeout(
      this.podReader.listNamespacedPod(
        namespace,
        undefined,
        undefined,
        undefined,
        undefined,
        `${PodLabel.Instance}=${releaseName}`
      ),
      this.requestTimeoutMs,
      `Listing pods of release ${releaseName} timed out after ${this.requestTimeoutMs}ms`
    )

    return body.items
  }

  private async listPodsWithFallback(namespace: string, releaseName: string): Promise<Array<V1Pod>> {
    try {
      return await this.listReleasePods(namespace, releaseName)
    } catch (error) {
      this.logger.warn(
        `Failed to list pods by instance label for ${releaseName} in ${namespace}, listing all pods`,
        describeError(error)
      )
    }

    try {
      const { body } = await withTimeout(
        this.podReader.listNamespacedPod(namespace),
        this.requestTimeoutMs,
        `Listing pods in ${namespace} timed out after ${this.requestTimeoutMs}ms`
      )

      return body.items
    } catch (error) {
      this.logger.error(`Failed to list pods in ${namespace}`, describeError(error))

      return []
    }
  }
}
