/* eslint-disable no-shadow */

export enum ReadyStatus {
  True = 'True',
  False = 'False',
  Unknown = 'Unknown',
}

export enum NamespaceWatcherState {
  Connecting = 'Connecting',
  Streaming = 'Streaming',
  Timeout = 'Timeout',
  StreamError = 'StreamError',
  Backoff = 'Backoff',
  Stopped = 'Stopped',
}

export enum WatcherHealthStatus {
  Waiting = 'waiting',
  Healthy = 'healthy',
  Stale = 'stale',
}

export enum PodLabel {
  Instance = 'app.kubernetes.io/instance',
  Chart = 'helm.sh/chart',
}
