import { describe, expect, it } from 'vitest'
import { colorOptions, isHexColor } from './colors'

describe('colors', () => {
  it('offers blue, green and red', () => {
    expect(colorOptions).toEqual([
      { name: 'Blue', hex: '#2196F3' },
      { name: 'Green', hex: '#4CAF50' },
      { name: 'Red', hex: '#F44336' },
    ])
  })

  it.each(['#2196F3', '#4caf50', '#000000'])('accepts %s', (value) => {
    expect(isHexColor(value)).toBe(true)
  })

  it.each(['2196F3', '#FFF', '#GGGGGG', '#2196F3AA', 42, null])('rejects %s', (value) => {
    expect(isHexColor(value)).toBe(false)
  })
})
