import type { KubernetesObject } from '@kubernetes/client-node'

export interface HelmChartTemplateSpec {
  chart?: string
  version?: string
}

export interface HelmReleaseSpec {
  chart?: {
    spec?: HelmChartTemplateSpec
  }
  releaseName?: string
}

export interface HelmReleaseCondition {
  type?: string
  status?: string
  reason?: string
  message?: string
  lastTransitionTime?: string
}

export interface HelmReleaseSnapshotEntry {
  chartName?: string
  chartVersion?: string
  appVersion?: string
  version?: number
  status?: string
}

export interface HelmReleaseStatus {
  lastAppliedRevision?: string
  lastAttemptedRevision?: string
  conditions?: Array<HelmReleaseCondition>
  history?: Array<HelmReleaseSnapshotEntry>
}

export interface HelmReleaseResource extends KubernetesObject {
  spec?: HelmReleaseSpec
  status?: HelmReleaseStatus
}
