import { describe, expect, it } from 'vitest'
import { BackStack } from './backStack'

describe('BackStack', () => {
  it('pushes entries in order and finds the previous one', () => {
    const stack = new BackStack()
    const home = stack.push('k1', '/home')
    stack.push('k2', '/color_picker')

    expect(stack.keys()).toEqual(['k1', 'k2'])
    expect(stack.previous('k2')).toBe(home)
    expect(stack.previous('k1')).toBeUndefined()
    expect(stack.previous('missing')).toBeUndefined()
  })

  it('does not duplicate an entry pushed twice', () => {
    const stack = new BackStack()
    const first = stack.push('k1', '/home')

    expect(stack.push('k1', '/home')).toBe(first)
    expect(stack.size).toBe(1)
  })

  it('adopts the entry created during render when it is pushed', () => {
    const stack = new BackStack()
    const rendered = stack.getOrCreate('k1', '/home')
    rendered.savedState.set('x', 1)

    const pushed = stack.push('k1', '/home')

    expect(pushed).toBe(rendered)
    expect(pushed.savedState.get('x')).toBe(1)
  })

  it('returns the same pending entry on repeated renders', () => {
    const stack = new BackStack()

    expect(stack.getOrCreate('k1', '/home')).toBe(stack.getOrCreate('k1', '/home'))
    expect(stack.size).toBe(0)
  })

  it('destroys entries above the target on popTo', () => {
    const stack = new BackStack()
    const home = stack.push('k1', '/home')
    const picker = stack.push('k2', '/color_picker')
    home.savedState.set('kept', true)

    expect(stack.popTo('k1')).toBe(true)
    expect(stack.keys()).toEqual(['k1'])
    expect(picker.savedState.isClosed).toBe(true)
    expect(home.savedState.get('kept')).toBe(true)
  })

  it('leaves the stack untouched when popping to an unknown key', () => {
    const stack = new BackStack()
    stack.push('k1', '/home')

    expect(stack.popTo('nope')).toBe(false)
    expect(stack.keys()).toEqual(['k1'])
  })

  it('destroys the top entry on replace', () => {
    const stack = new BackStack()
    const root = stack.push('default', '/')
    stack.replace('k1', '/home')

    expect(stack.keys()).toEqual(['k1'])
    expect(root.savedState.isClosed).toBe(true)
  })

  it('treats replacing the top with itself as a no-op', () => {
    const stack = new BackStack()
    const top = stack.push('k1', '/home')

    expect(stack.replace('k1', '/home')).toBe(top)
    expect(top.savedState.isClosed).toBe(false)
  })

  it('closes every entry on clear', () => {
    const stack = new BackStack()
    const a = stack.push('k1', '/home')
    const pending = stack.getOrCreate('k2', '/color_picker')

    stack.clear()

    expect(stack.size).toBe(0)
    expect(a.savedState.isClosed).toBe(true)
    expect(pending.savedState.isClosed).toBe(true)
  })
})
