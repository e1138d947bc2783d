import type { Clock } from './release-notification.interfaces'

export class WatcherHealthRegistry {
  private readonly lastEvents = new Map<string, number>()

  constructor(private readonly clock: Clock = Date.now) {}

  touch(namespace: string, at: number = this.clock()): void {
    this.lastEvents.set(namespace, at)
  }

  getLastEventAt(namespace: string): number | undefined {
    return this.lastEvents.get(namespace)
  }
}
