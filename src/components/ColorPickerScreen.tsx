/**
 * ColorPickerScreen — hands the chosen color back to the screen below it.
 *
 * Selecting writes the color into the previous entry's saved state and
 * goes back. Cancelling goes back without writing.
 */

import { useNavigate } from 'react-router-dom'
import { usePreviousEntry } from '@/hooks/useNavigationEntry'
import { COLOR_RESULT_KEY, colorOptions } from '@/lib/colors'
import { setResult } from '@/lib/resultChannel'
import type { ColorOption } from '@/lib/types'

export function ColorPickerScreen() {
  const navigate = useNavigate()
  const getPreviousEntry = usePreviousEntry()

  const handleSelect = (option: ColorOption) => {
    setResult(getPreviousEntry(), COLOR_RESULT_KEY, option.hex)
    navigate(-1)
  }

  return (
    <div className="screen">
      <h2>Select a Color</h2>
      <div className="color-options">
        {colorOptions.map((option) => (
          <button
            key={option.name}
            className="color-option"
            style={{ backgroundColor: option.hex }}
            onClick={() => handleSelect(option)}
          >
            Select {option.name}
          </button>
        ))}
      </div>
      <button className="ghost" onClick={() => navigate(-1)}>
        Cancel
      </button>
    </div>
  )
}
