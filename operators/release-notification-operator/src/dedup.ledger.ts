export interface DedupLedger {
  shouldProcess(key: string): boolean
  markProcessed(key: string): void
}

export class InMemoryDedupLedger implements DedupLedger {
  private readonly processed = new Set<string>()

  get size(): number {
    return this.processed.size
  }

  shouldProcess(key: string): boolean {
    return !this.processed.has(key)
  }

  markProcessed(key: string): void {
    this.processed.add(key)
  }
}
