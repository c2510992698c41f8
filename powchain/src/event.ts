/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

export type EventHandler<A extends unknown[]> = (...args: A) => void

/**
 * A typed, synchronous event. Handlers run in subscription order before
 * `emit` returns.
 */
export class Event<A extends unknown[]> {
  private handlers: Set<EventHandler<A>> = new Set()

  /**
   * @returns true if the Event has no listeners
   */
  get isEmpty(): boolean {
    return this.handlers.size === 0
  }

  get subscribers(): number {
    return this.handlers.size
  }

  /**
   * Adds a handler for when the event is emitted
   * Make sure you unsubscribe using [[Event.off]]
   */
  on(handler: EventHandler<A>): void {
    this.handlers.add(handler)
  }

  /**
   * @returns true if the handler was removed
   */
  off(handler: EventHandler<A>): boolean {
    return this.handlers.delete(handler)
  }

  /**
   * Adds an event handler that's removed after the next event is emitted
   */
  once(handler: EventHandler<A>): void {
    const wrapper = (...args: A): void => {
      this.off(wrapper)
      handler(...args)
    }
    this.handlers.add(wrapper)
  }

  emit(...args: A): void {
    for (const handler of Array.from(this.handlers)) {
      if (this.handlers.has(handler)) {
        handler(...args)
      }
    }
  }

  clear(): void {
    this.handlers.clear()
  }
}
