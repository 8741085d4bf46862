// Amounts carry two decimals; sums are taken in integer cents to avoid float drift

export function toCents(amount: number): number {
  return Math.round(amount * 100)
}

export function fromCents(cents: number): number {
  return cents / 100 || 0
}

export function roundMoney(value: number): number {
  return Math.round(value * 100) / 100 || 0
}
