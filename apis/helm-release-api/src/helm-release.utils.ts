import { getResourceApiUri }          from '@release-notifier/k8s-operator'

import { HelmReleaseDomain }          from './helm-release.types'
import { HelmReleaseResourceGroup }   from './helm-release.types'
import { HelmReleaseResourceVersion } from './helm-release.types'

export const getHelmReleasesApiUri = (
  namespace: string,
  version: HelmReleaseResourceVersion = HelmReleaseResourceVersion.v2
): string =>
  getResourceApiUri(
    HelmReleaseDomain.Group,
    version,
    HelmReleaseResourceGroup.HelmRelease,
    namespace
  )

export const isHelmReleaseResourceVersion = (
  value: string
): value is HelmReleaseResourceVersion =>
  Object.values<string>(HelmReleaseResourceVersion).includes(value)
