import type { KubernetesObject }       from '@kubernetes/client-node'

import { HelmReleaseConditionType }    from '@release-notifier/k8s-helm-release-api'

import type { ReleaseSnapshot }        from './release-notification.interfaces'

import { ReadyStatus }                 from './release-notification.types'

export const UNKNOWN_VALUE = 'unknown'

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value)

const getPath = (source: unknown, path: ReadonlyArray<string>): unknown =>
  path.reduce<unknown>((value, key) => (isRecord(value) ? value[key] : undefined), source)

const getString = (source: unknown, path: ReadonlyArray<string>): string | undefined => {
  const value = getPath(source, path)

  return typeof value === 'string' ? value : undefined
}

const getVersion = (source: unknown, path: ReadonlyArray<string>): string =>
  getString(source, path) || UNKNOWN_VALUE

const findReadyCondition = (resource: KubernetesObject): Record<string, unknown> | undefined => {
  const conditions = getPath(resource, ['status', 'conditions'])

  if (!Array.isArray(conditions)) {
    return undefined
  }

  return conditions
    .filter(isRecord)
    .find((condition) => condition.type === HelmReleaseConditionType.Ready)
}

const toReadyStatus = (status: unknown): ReadyStatus => {
  if (status === ReadyStatus.True) {
    return ReadyStatus.True
  }

  if (status === ReadyStatus.False) {
    return ReadyStatus.False
  }

  return ReadyStatus.Unknown
}

export const extractReleaseSnapshot = (
  resource: KubernetesObject,
  fallbackNamespace = ''
): ReleaseSnapshot => {
  const condition = findReadyCondition(resource)
  const message = condition?.message
  const history = getPath(resource, ['status', 'history'])

  return {
    namespace: resource.metadata?.namespace || fallbackNamespace,
    name: resource.metadata?.name ?? '',
    chartName: getVersion(resource, ['spec', 'chart', 'spec', 'chart']),
    chartVersion: getVersion(resource, ['spec', 'chart', 'spec', 'version']),
    appVersion: Array.isArray(history) ? getVersion(history[0], ['appVersion']) : UNKNOWN_VALUE,
    revision: getString(resource, ['status', 'lastAppliedRevision']) ?? '',
    ready: toReadyStatus(condition?.status),
    message: typeof message === 'string' ? message : '',
  }
}

export const getDeduplicationKey = ({ namespace, name, revision }: ReleaseSnapshot): string =>
  `${namespace}/${name}/${revision}`

export const isFreshDeploymentCandidate = (snapshot: ReleaseSnapshot): boolean =>
  snapshot.ready === ReadyStatus.True
