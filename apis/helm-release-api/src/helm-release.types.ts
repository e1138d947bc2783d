/* eslint-disable no-shadow */

export enum HelmReleaseResourceVersion {
  v2 = 'v2',
  v2beta2 = 'v2beta2',
  v2beta1 = 'v2beta1',
}

export enum HelmReleaseResourceGroup {
  HelmRelease = 'helmreleases',
}

export enum HelmReleaseDomain {
  Group = 'helm.toolkit.fluxcd.io',
}

export enum HelmReleaseConditionType {
  Ready = 'Ready',
}
