export interface FormatDirective {
  /** Single trigger character, matched after a literal `%`. */
  readonly char: string
  readonly evaluate: () => unknown
}

export type ReminderSink = (title: string, body: string) => void

export interface ReminderConfig {
  readonly intervalMs: number
  readonly remindInactivity: boolean
  readonly title: string
  readonly messageTemplate: string
  readonly emptyText: string
  readonly showIcons: boolean
  readonly activeIconPath: string | null
  readonly inactiveIconPath: string | null
  readonly directives: readonly FormatDirective[]
  readonly sinks: readonly ReminderSink[]
}

export type ActivityEvent = 'clock-in' | 'clock-out'

export type ActivityListener = (event: ActivityEvent) => void

export interface ActivitySource {
  isActive(): boolean
  /** Throws when nothing is clocked in. */
  currentLabel(): string
  /** Throws when nothing is clocked in. */
  elapsedMinutes(): number
  /** Registers for clock-in/clock-out signals; returns the unsubscribe call. */
  subscribe(listener: ActivityListener): () => void
}

export type LifecycleState = 'dormant' | 'clocked-out' | 'clocked-in'

export type LifecycleTrigger = 'activate' | 'clock-in' | 'clock-out' | 'deactivate'
