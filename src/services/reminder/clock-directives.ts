import type { ActivitySource, FormatDirective } from './reminder-types'

/**
 * Render whole minutes as `h:mm`.
 */
export function formatDuration(minutes: number): string {
  const total = Math.max(0, Math.floor(minutes))
  const hours = Math.floor(total / 60)
  const rest = total % 60
  return `${hours}:${String(rest).padStart(2, '0')}`
}

/**
 * Directives backed by the activity source:
 * `%h` label, `%c` elapsed time as h:mm, `%m` elapsed minutes.
 */
export function createClockDirectives(
  activity: Pick<ActivitySource, 'currentLabel' | 'elapsedMinutes'>,
): readonly FormatDirective[] {
  return [
    { char: 'h', evaluate: () => activity.currentLabel() },
    { char: 'c', evaluate: () => formatDuration(activity.elapsedMinutes()) },
    { char: 'm', evaluate: () => activity.elapsedMinutes() },
  ]
}
