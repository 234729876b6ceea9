const pad = (value: number, width: number = 2): string => String(value).padStart(width, '0')

/**
 * Local time as YYYY-MM-DD_HH-MM-SS, used as the output file suffix
 */
export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`
  const time = `${pad(date.getHours())}-${pad(date.getMinutes())}-${pad(date.getSeconds())}`
  return `${day}_${time}`
}

/**
 * Local time as YYYY-MM-DDTHH:MM:SS.mmm, without a zone suffix
 */
export function formatLocalIso(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  return `${day}T${time}.${pad(date.getMilliseconds(), 3)}`
}
