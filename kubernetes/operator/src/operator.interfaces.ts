import type { KubernetesObject }  from '@kubernetes/client-node'

import type { ResourceEventType } from './operator.enums'

export interface ResourceEvent {
  type: ResourceEventType
  object: KubernetesObject
}

export type ResourceEventHandler = (event: ResourceEvent) => void

export interface WatchOptions {
  timeoutSeconds?: number
  signal?: AbortSignal
  onConnect?: () => void
}

export interface ResourceWatcher {
  watch(path: string, options: WatchOptions, onEvent: ResourceEventHandler): Promise<void>
}
