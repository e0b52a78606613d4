import { describe, expect, it, vi } from 'vitest'
import { BackStack } from './backStack'
import { COLOR_RESULT_KEY } from './colors'
import { consumeResult, observeResult, peekResult, setResult } from './resultChannel'

function homeAndPicker() {
  const stack = new BackStack()
  const home = stack.push('home-key', '/home')
  stack.push('picker-key', '/color_picker')
  return { stack, home }
}

describe('result channel', () => {
  it('uses the well-known slot name for colors', () => {
    expect(COLOR_RESULT_KEY.name).toBe('selected_color_key')
  })

  it('writes the result on the entry below the producer', () => {
    const { stack, home } = homeAndPicker()

    const written = setResult(stack.previous('picker-key'), COLOR_RESULT_KEY, '#4CAF50')

    expect(written).toBe(true)
    expect(home.savedState.get('selected_color_key')).toBe('#4CAF50')
  })

  it('skips the write when there is no previous entry', () => {
    const stack = new BackStack()
    stack.push('picker-key', '/color_picker')

    expect(setResult(stack.previous('picker-key'), COLOR_RESULT_KEY, '#2196F3')).toBe(false)
  })

  it('skips the write when the entry has been destroyed', () => {
    const { stack, home } = homeAndPicker()
    stack.clear()

    expect(setResult(home, COLOR_RESULT_KEY, '#2196F3')).toBe(false)
  })

  it('pushes the latest value to observers', () => {
    const { home } = homeAndPicker()
    const listener = vi.fn()
    observeResult(home.savedState, COLOR_RESULT_KEY, listener)

    setResult(home, COLOR_RESULT_KEY, '#F44336')
    consumeResult(home.savedState, COLOR_RESULT_KEY)

    expect(listener.mock.calls).toEqual([['#F44336'], [undefined]])
  })

  it('clears the slot when consumed so the value is delivered once', () => {
    const { home } = homeAndPicker()
    setResult(home, COLOR_RESULT_KEY, '#2196F3')

    expect(consumeResult(home.savedState, COLOR_RESULT_KEY)).toBe('#2196F3')
    expect(consumeResult(home.savedState, COLOR_RESULT_KEY)).toBeUndefined()
    expect(home.savedState.has('selected_color_key')).toBe(false)
  })

  it('reads a value that fails the key guard as absent', () => {
    const { home } = homeAndPicker()
    home.savedState.set('selected_color_key', 'blue')

    expect(peekResult(home.savedState, COLOR_RESULT_KEY)).toBeUndefined()
    expect(consumeResult(home.savedState, COLOR_RESULT_KEY)).toBeUndefined()
    expect(home.savedState.has('selected_color_key')).toBe(false)
  })
})
