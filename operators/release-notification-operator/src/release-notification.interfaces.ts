import type { ReadyStatus }         from './release-notification.types'
import type { WatcherHealthStatus } from './release-notification.types'

export interface ReleaseSnapshot {
  readonly namespace: string
  readonly name: string
  readonly chartName: string
  readonly chartVersion: string
  readonly appVersion: string
  readonly revision: string
  readonly ready: ReadyStatus
  readonly message: string
}

export interface ServiceVersion {
  name: string
  image: string
  tag: string
}

export interface ChartDependency {
  name: string
  version: string
}

export interface DeploymentReplicas {
  desired: number
  ready: number
}

export interface ReleaseEnrichment {
  serviceVersions: Array<ServiceVersion>
  dependencies: Array<ChartDependency>
  replicas: DeploymentReplicas | null
}

export interface ReleaseEnricher {
  enrich(snapshot: ReleaseSnapshot): Promise<ReleaseEnrichment>
}

export interface WatcherHealthReport {
  namespace: string
  status: WatcherHealthStatus
  elapsedMs: number | null
}

export type Clock = () => number
