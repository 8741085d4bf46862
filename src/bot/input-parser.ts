import { MAX_AMOUNT, MONTH_NAMES } from '../constants'

const AMOUNT_REGEX = /^\d+(\.\d{1,2})?$/

/**
 * Parses a positive amount typed as 1234.56 or 1234,56
 * @returns The amount, or undefined when the text is not a positive amount with at most two decimals
 *   within the stored column range
 */
export function parseAmount(text: string): number | undefined {
  const normalized = text.replace(',', '.').trim()
  if (!AMOUNT_REGEX.test(normalized)) {
    return undefined
  }

  const amount = Number.parseFloat(normalized)

  return amount > 0 && amount <= MAX_AMOUNT ? amount : undefined
}

/**
 * Month number (1-12) for a month name, case-insensitive
 */
export function parseMonthName(text: string): number | undefined {
  const wanted = text.trim().toLowerCase()
  const index = MONTH_NAMES.findIndex((name) => {
    return name.toLowerCase() === wanted
  })

  return index === -1 ? undefined : index + 1
}

/**
 * True when the text is one of the buttons of a keyboard layout
 */
export function isKeyboardOption(layout: string[][], text: string): boolean {
  return layout.some((row) => {
    return row.includes(text)
  })
}
