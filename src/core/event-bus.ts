/**
 * Typed pub/sub between the conductor modules.
 *
 * The task queue, escalation manager and orchestrator publish here; the CLI
 * and tests subscribe. Dispatch is synchronous: every handler has run by the
 * time `emit` returns.
 */

import { EventEmitter } from 'node:events'
import type { ConductorEvents } from './event-bus.types.js'

export type ConductorEventName = keyof ConductorEvents

export type EventHandler<K extends ConductorEventName> = (payload: ConductorEvents[K]) => void

export interface TypedEventBus {
  emit<K extends ConductorEventName>(event: K, payload: ConductorEvents[K]): void
  /** @returns a function that removes the handler again */
  on<K extends ConductorEventName>(event: K, handler: EventHandler<K>): () => void
  /** Removing an unknown handler does nothing */
  off<K extends ConductorEventName>(event: K, handler: EventHandler<K>): void
}

/**
 * @example
 * const bus = new TypedEventBusImpl()
 * const stop = bus.on('escalation:created', ({ escalationId }) => notify(escalationId))
 * // ...
 * stop()
 */
export class TypedEventBusImpl implements TypedEventBus {
  // One orchestrator, one queue and one escalation manager per process
  private readonly _emitter = new EventEmitter().setMaxListeners(20)

  emit<K extends ConductorEventName>(event: K, payload: ConductorEvents[K]): void {
    this._emitter.emit(event, payload)
  }

  on<K extends ConductorEventName>(event: K, handler: EventHandler<K>): () => void {
    this._emitter.on(event, handler)
    return () => this.off(event, handler)
  }

  off<K extends ConductorEventName>(event: K, handler: EventHandler<K>): void {
    this._emitter.off(event, handler)
  }

  listenerCount(event: ConductorEventName): number {
    return this._emitter.listenerCount(event)
  }
}

export function createEventBus(): TypedEventBus {
  return new TypedEventBusImpl()
}
