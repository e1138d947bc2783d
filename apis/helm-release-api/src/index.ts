export * from './helm-release.interfaces'
export * from './helm-release.types'
export * from './helm-release.utils'
