/**
 * Two decimals, halves rounded up from the decimal text (2.675 -> 2.68).
 */
export function formatMoney(value: number): string {
  const cents = Math.round(Number(`${value}e2`))
  return Number.isFinite(cents) ? (cents / 100).toFixed(2) : value.toFixed(2)
}

export function formatDate(value: Date): string {
  return value.toISOString().slice(0, 10)
}

export function generateTable(headers: string[], rows: string[][]): string {
  const headerRow = `| ${headers.join(' | ')} |`
  const separator = `| ${headers.map(() => '---').join(' | ')} |`
  const dataRows = rows.map((row) => `| ${row.join(' | ')} |`)
  return [headerRow, separator, ...dataRows].join('\n')
}
