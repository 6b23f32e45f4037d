/**
 * Format a metric value with thousands separators and a unit suffix
 */
export function formatMetricValue(value: number, unit: string = '', decimals: number = 2): string {
  const body = value.toLocaleString('en-US', { minimumFractionDigits: decimals, maximumFractionDigits: decimals })
  return `${body}${unit}`
}

/**
 * Format a signed percentage change, e.g. "+1.25%"
 */
export function formatChange(value: number, decimals: number = 2): string {
  const sign = value > 0 ? '+' : ''
  return `${sign}${value.toFixed(decimals)}%`
}

/**
 * Format a correlation coefficient, "N/A" when undefined
 */
export function formatCorrelation(value: number | null, decimals: number = 3): string {
  return value === null ? 'N/A' : value.toFixed(decimals)
}

/**
 * Human-readable shift, e.g. "3mo lag" or "2mo lead"
 */
export function formatShift(periods: number): string {
  if (periods === 0) return ''
  const direction = periods < 0 ? 'lead' : 'lag'
  return `${Math.abs(periods)}mo ${direction}`
}
