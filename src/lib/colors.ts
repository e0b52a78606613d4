/**
 * Color options offered by the picker, and the result key the picker
 * writes its selection under.
 */

import { createResultKey } from './resultChannel'
import type { ColorOption, HexColor } from './types'

const HEX_COLOR = /^#[0-9A-Fa-f]{6}$/

export function isHexColor(value: unknown): value is HexColor {
  return typeof value === 'string' && HEX_COLOR.test(value)
}

export const colorOptions: readonly ColorOption[] = [
  { name: 'Blue', hex: '#2196F3' },
  { name: 'Green', hex: '#4CAF50' },
  { name: 'Red', hex: '#F44336' },
]

/** Swatch color shown before any selection has been applied */
export const DEFAULT_SWATCH_COLOR: HexColor = '#D3D3D3'

export const COLOR_RESULT_KEY = createResultKey('selected_color_key', isHexColor)
