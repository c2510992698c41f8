/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { Event } from './event'

describe('Event', () => {
  it('should emit', () => {
    const event = new Event<[number, boolean]>()

    let fired = false

    event.on((a, b) => {
      expect(a).toBe(5)
      expect(b).toBe(true)
      fired = true
    })

    event.emit(5, true)
    expect(fired).toBe(true)
  })

  it('should remove once', () => {
    const event = new Event<[]>()

    const mock = jest.fn()

    event.once(mock)

    event.emit()
    event.emit()
    expect(mock).toBeCalledTimes(1)
    expect(event.isEmpty).toBeTruthy()
  })

  it('should stop calling a handler after off', () => {
    const event = new Event<[string]>()
    const mock = jest.fn()

    event.on(mock)
    expect(event.subscribers).toBe(1)

    expect(event.off(mock)).toBe(true)
    expect(event.off(mock)).toBe(false)

    event.emit('ignored')
    expect(mock).not.toBeCalled()
  })

  it('should skip handlers removed during emit', () => {
    const event = new Event<[]>()
    const second = jest.fn()
    const first = jest.fn(() => {
      event.off(second)
    })

    event.on(first)
    event.on(second)
    event.emit()

    expect(first).toBeCalledTimes(1)
    expect(second).not.toBeCalled()
  })

  it('should clear all handlers', () => {
    const event = new Event<[]>()
    event.on(jest.fn())
    event.on(jest.fn())

    event.clear()

    expect(event.isEmpty).toBe(true)
  })
})
