/**
 * Output formatting helpers shared by the commands
 */

/**
 * Format a duration in ms: 850ms, 12.3s, 4m 5s
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${Math.round(ms)}ms`
  }
  if (ms < 60_000) {
    return `${(ms / 1000).toFixed(1)}s`
  }
  const minutes = Math.floor(ms / 60_000)
  const seconds = Math.round((ms % 60_000) / 1000)
  return `${minutes}m ${seconds}s`
}

/**
 * Format an ISO timestamp or Date for display; null prints as "Never"
 */
export function formatDate(value: string | Date | null | undefined): string {
  if (value === null || value === undefined) {
    return 'Never'
  }
  const date = typeof value === 'string' ? new Date(value) : value
  if (Number.isNaN(date.getTime())) {
    return String(value)
  }
  return date.toLocaleString()
}

/**
 * Format a byte count: 512 B, 1.5 KB, 2.25 MB
 */
export function formatBytes(bytes: number): string {
  if (bytes < 1024) {
    return `${bytes} B`
  }
  const units = ['KB', 'MB', 'GB']
  let value = bytes / 1024
  let unit = 0
  while (value >= 1024 && unit < units.length - 1) {
    value /= 1024
    unit++
  }
  return `${Number(value.toFixed(2))} ${units[unit]}`
}

/**
 * Format fractional hours: 1.5 -> "1h 30m"
 */
export function formatHours(hours: number): string {
  const totalMinutes = Math.max(0, Math.round(hours * 60))
  const h = Math.floor(totalMinutes / 60)
  const m = totalMinutes % 60
  return h > 0 ? `${h}h ${m}m` : `${m}m`
}

/**
 * Format a 0..1 ratio as a percentage
 */
export function formatPercent(ratio: number): string {
  return `${(ratio * 100).toFixed(1)}%`
}
