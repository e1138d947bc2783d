import { HelmReleaseResourceVersion }   from '@release-notifier/k8s-helm-release-api'
import { isHelmReleaseResourceVersion } from '@release-notifier/k8s-helm-release-api'

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message)

    this.name = 'ConfigurationError'
  }
}

export interface ReleaseNotifierConfig {
  webhookUrl: string
  namespaces: Array<string>
  apiVersion: HelmReleaseResourceVersion
  logLevel: string
}

export const DEFAULT_NAMESPACES = 'production,staging'

const LOG_LEVELS: ReadonlyArray<string> = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']

export const parseNamespaces = (value: string): Array<string> =>
  Array.from(
    new Set(
      value
        .split(',')
        .map((namespace) => namespace.trim())
        .filter(Boolean)
    )
  )

export const loadReleaseNotifierConfig = (
  env: NodeJS.ProcessEnv = process.env
): ReleaseNotifierConfig => {
  const webhookUrl = env.SLACK_WEBHOOK_URL?.trim()

  if (!webhookUrl) {
    throw new ConfigurationError('SLACK_WEBHOOK_URL is required')
  }

  const namespaces = parseNamespaces(env.MONITORED_NAMESPACES ?? DEFAULT_NAMESPACES)

  if (namespaces.length === 0) {
    throw new ConfigurationError('MONITORED_NAMESPACES must name at least one namespace')
  }

  const apiVersion = env.HELM_RELEASE_API_VERSION?.trim() || HelmReleaseResourceVersion.v2

  if (!isHelmReleaseResourceVersion(apiVersion)) {
    throw new ConfigurationError(`Unsupported HELM_RELEASE_API_VERSION: ${apiVersion}`)
  }

  const logLevel = env.LOG_LEVEL?.trim().toLowerCase() || 'info'

  if (!LOG_LEVELS.includes(logLevel)) {
    throw new ConfigurationError(`Unsupported LOG_LEVEL: ${logLevel}`)
  }

  return {
    webhookUrl,
    namespaces,
    apiVersion,
    logLevel,
  }
}
