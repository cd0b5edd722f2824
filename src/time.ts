/** `HH:MM:SS.ss`, hours are not wrapped. */
export function formatHms(totalSeconds: number): string {
  const safe = Number.isFinite(totalSeconds) && totalSeconds > 0 ? totalSeconds : 0
  const hundredths = Math.round(safe * 100)
  const hours = Math.floor(hundredths / 360_000)
  const minutes = Math.floor((hundredths % 360_000) / 6000)
  const seconds = (hundredths % 6000) / 100
  return `${pad2(hours)}:${pad2(minutes)}:${seconds.toFixed(2).padStart(5, '0')}`
}

/** `HH:MM:SS` for whole-minute values such as schedule estimates. */
export function formatMinutesAsClock(minutes: number): string {
  const totalSeconds = Math.trunc(minutes * 60)
  const hours = Math.floor(totalSeconds / 3600)
  const mins = Math.floor((totalSeconds % 3600) / 60)
  const secs = totalSeconds % 60
  return `${pad2(hours)}:${pad2(mins)}:${pad2(secs)}`
}

export function formatFileTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad2(date.getMonth() + 1)}${pad2(date.getDate())}` +
    `_${pad2(date.getHours())}${pad2(date.getMinutes())}${pad2(date.getSeconds())}`
  )
}

function pad2(value: number): string {
  return String(value).padStart(2, '0')
}
