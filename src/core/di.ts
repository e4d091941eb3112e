/**
 * Service lifecycle.
 *
 * Services that hold resources (the state database, the orchestrator's event
 * subscriptions) implement BaseService. A ServiceRegistry starts them in
 * order and stops the started ones in reverse.
 */

export interface BaseService {
  initialize(): Promise<void>
  shutdown(): Promise<void>
}

interface RegistryEntry {
  name: string
  service: BaseService
  started: boolean
}

/**
 * @example
 * const registry = new ServiceRegistry()
 * const database = await registry.start('database', createDatabaseService(path))
 * const orchestrator = await registry.start('orchestrator', createOrchestrator({ db: database.db, ... }))
 * // ...
 * await registry.shutdownAll()
 */
export class ServiceRegistry {
  private readonly _entries: RegistryEntry[] = []

  /**
   * Add a service without starting it; `initializeAll` starts it later.
   * @throws {Error} for a duplicate name
   */
  register<T extends BaseService>(name: string, service: T): T {
    if (this.has(name)) {
      throw new Error(`Service "${name}" is already registered`)
    }
    this._entries.push({ name, service, started: false })
    return service
  }

  /**
   * Register and initialize in one step. A service whose initialize throws
   * stays registered but is not shut down.
   */
  async start<T extends BaseService>(name: string, service: T): Promise<T> {
    this.register(name, service)
    await this._startEntry(this._entries[this._entries.length - 1])
    return service
  }

  has(name: string): boolean {
    return this._entries.some((entry) => entry.name === name)
  }

  /** Start every registered service that is not running yet, in order */
  async initializeAll(): Promise<void> {
    for (const entry of this._entries) {
      if (!entry.started) await this._startEntry(entry)
    }
  }

  /**
   * Stop started services in reverse order. Every service gets its turn;
   * failures are thrown together as an AggregateError at the end.
   */
  async shutdownAll(): Promise<void> {
    const errors: Error[] = []

    for (const entry of [...this._entries].reverse()) {
      if (!entry.started) continue
      try {
        await entry.service.shutdown()
      } catch (err) {
        errors.push(err instanceof Error ? err : new Error(String(err)))
      } finally {
        entry.started = false
      }
    }

    if (errors.length > 0) {
      throw new AggregateError(errors, `Shutdown errors in ${String(errors.length)} service(s)`)
    }
  }

  get serviceNames(): string[] {
    return this._entries.map((entry) => entry.name)
  }

  private async _startEntry(entry: RegistryEntry | undefined): Promise<void> {
    if (entry === undefined) return
    await entry.service.initialize()
    entry.started = true
  }
}
