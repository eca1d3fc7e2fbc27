import type {
  ActivityEvent,
  ActivityListener,
  ActivitySource,
} from '@/services/reminder/reminder-types'

export interface ClockEntry {
  readonly label: string
  readonly startedAt: number
  readonly endedAt: number
  readonly minutes: number
}

export interface RunningClock {
  readonly label: string
  readonly startedAt: number
}

export interface ClockTrackerOptions {
  readonly now?: () => number
}

const MS_PER_MINUTE = 60_000

export class ClockTracker implements ActivitySource {
  private current: RunningClock | null = null
  private readonly listeners = new Set<ActivityListener>()
  private readonly now: () => number

  constructor(options?: ClockTrackerOptions) {
    this.now = options?.now ?? (() => Date.now())
  }

  /**
   * Start clocking `label`. A running clock is closed first, so listeners see
   * `clock-out` before `clock-in`.
   */
  clockIn(label: string): void {
    const trimmed = label.trim()
    if (!trimmed) {
      throw new Error('Clock label cannot be empty')
    }

    if (this.current !== null) {
      this.clockOut()
    }

    this.current = { label: trimmed, startedAt: this.now() }
    this.emit('clock-in')
  }

  clockOut(): ClockEntry | null {
    if (this.current === null) {
      return null
    }

    const endedAt = this.now()
    const entry: ClockEntry = {
      label: this.current.label,
      startedAt: this.current.startedAt,
      endedAt,
      minutes: toMinutes(endedAt - this.current.startedAt),
    }
    this.current = null
    this.emit('clock-out')
    return entry
  }

  isActive(): boolean {
    return this.current !== null
  }

  currentLabel(): string {
    return this.requireCurrent().label
  }

  elapsedMinutes(): number {
    return toMinutes(this.now() - this.requireCurrent().startedAt)
  }

  getCurrent(): RunningClock | null {
    return this.current
  }

  subscribe(listener: ActivityListener): () => void {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  private requireCurrent(): RunningClock {
    if (this.current === null) {
      throw new Error('Nothing is clocked in')
    }
    return this.current
  }

  private emit(event: ActivityEvent): void {
    for (const listener of this.listeners) {
      listener(event)
    }
  }
}

function toMinutes(ms: number): number {
  return Math.max(0, Math.floor(ms / MS_PER_MINUTE))
}
