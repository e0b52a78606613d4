/**
 * HomeScreen — start of the result-return flow.
 *
 * Opens the color picker and applies whatever color it hands back through
 * this entry's saved state.
 */

import { useCallback, useState } from 'react'
import { useNavigate } from 'react-router-dom'
import { useResultConsumer } from '@/hooks/useResultConsumer'
import { COLOR_RESULT_KEY, DEFAULT_SWATCH_COLOR } from '@/lib/colors'
import { routes } from '@/lib/routeConfig'
import type { HexColor } from '@/lib/types'

export const NO_SELECTION_TEXT = 'No color selected yet.'

export function HomeScreen() {
  const navigate = useNavigate()
  const [appliedColor, setAppliedColor] = useState<HexColor>(DEFAULT_SWATCH_COLOR)
  const [resultText, setResultText] = useState(NO_SELECTION_TEXT)

  const applyColor = useCallback((hex: HexColor) => {
    setAppliedColor(hex)
    setResultText(`Successfully applied color: ${hex}`)
  }, [])

  useResultConsumer(COLOR_RESULT_KEY, applyColor)

  return (
    <div className="screen">
      <h1>Home Screen</h1>
      <div
        className="color-swatch"
        data-testid="color-swatch"
        style={{ backgroundColor: appliedColor }}
      />
      <p className="result-text">{resultText}</p>
      <button className="primary" onClick={() => navigate(routes.colorPicker)}>
        Go Pick a Color
      </button>
    </div>
  )
}
