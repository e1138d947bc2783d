import { KubeConfig } from '@kubernetes/client-node'

import { Logger }     from '@release-notifier/logger'

export abstract class Operator {
  protected abortController = new AbortController()

  protected readonly logger: Logger

  protected kubeConfig: KubeConfig

  constructor(kubeConfig?: KubeConfig) {
    this.logger = new Logger(this.constructor.name)

    if (kubeConfig) {
      this.kubeConfig = kubeConfig
    } else {
      this.kubeConfig = new KubeConfig()
      this.kubeConfig.loadFromDefault()
    }
  }

  public async start(): Promise<void> {
    return this.init()
  }

  public stop(): void {
    this.abortController.abort()
  }

  protected get signal(): AbortSignal {
    return this.abortController.signal
  }

  protected abstract init(): Promise<void>
}
