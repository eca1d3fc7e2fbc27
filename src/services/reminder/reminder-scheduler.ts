import type {
  ActivityEvent,
  ActivitySource,
  LifecycleState,
  ReminderConfig,
} from './reminder-types'
import { ReminderLifecycle } from './reminder-lifecycle'
import { createDirectiveTable, renderTemplate, type DirectiveTable } from './formatter'
import { createSinkChain, type SinkChain, type SinkChainOptions } from './sink-chain'
import { ConfigurationError, describeError } from './reminder-errors'

export interface ReminderSchedulerDeps {
  readonly activity: ActivitySource
  readonly lifecycle?: ReminderLifecycle
  readonly onTickError?: (error: unknown) => void
  readonly onSinkError?: SinkChainOptions['onSinkError']
}

function logTickError(error: unknown): void {
  console.error('Reminder skipped:', describeError(error))
}

/** Longest delay `setInterval` honours; anything above fires after 1 ms. */
export const MAX_INTERVAL_MS = 2_147_483_647

export function validateInterval(intervalMs: number): void {
  if (!Number.isFinite(intervalMs) || intervalMs <= 0) {
    throw new ConfigurationError('intervalMs', `Value must be greater than 0, got ${intervalMs}`)
  }
  if (intervalMs > MAX_INTERVAL_MS) {
    throw new ConfigurationError(
      'intervalMs',
      `Value must be at most ${MAX_INTERVAL_MS}, got ${intervalMs}`,
    )
  }
}

export class ReminderScheduler {
  private config: ReminderConfig
  private directives: DirectiveTable
  private sinkChain: SinkChain
  private readonly activity: ActivitySource
  private readonly lifecycle: ReminderLifecycle
  private readonly onTickError: (error: unknown) => void
  private readonly onSinkError: SinkChainOptions['onSinkError']
  private timer: ReturnType<typeof setInterval> | null = null
  private unsubscribe: (() => void) | null = null

  constructor(config: ReminderConfig, deps: ReminderSchedulerDeps) {
    this.activity = deps.activity
    this.lifecycle = deps.lifecycle ?? new ReminderLifecycle()
    this.onTickError = deps.onTickError ?? logTickError
    this.onSinkError = deps.onSinkError
    this.config = config
    this.directives = createDirectiveTable(config.directives)
    this.sinkChain = createSinkChain(config.sinks, { onSinkError: this.onSinkError })
  }

  activate(): void {
    if (this.timer !== null) {
      return
    }

    validateInterval(this.config.intervalMs)

    try {
      this.lifecycle.activate()
      if (this.activity.isActive()) {
        this.lifecycle.clockIn()
      }
      this.unsubscribe = this.activity.subscribe((event) => this.handleActivity(event))
    } catch (err) {
      this.lifecycle.deactivate()
      throw err
    }

    this.timer = setInterval(() => {
      this.runTick()
    }, this.config.intervalMs)
  }

  deactivate(): void {
    if (this.timer === null) {
      return
    }

    clearInterval(this.timer)
    this.timer = null
    this.unsubscribe?.()
    this.unsubscribe = null
    this.lifecycle.deactivate()
  }

  toggle(): boolean {
    if (this.isActive()) {
      this.deactivate()
    } else {
      this.activate()
    }
    return this.isActive()
  }

  isActive(): boolean {
    return this.timer !== null
  }

  getState(): LifecycleState {
    return this.lifecycle.getState()
  }

  getLifecycle(): ReminderLifecycle {
    return this.lifecycle
  }

  getConfig(): ReminderConfig {
    return this.config
  }

  /**
   * Replace the configuration used by upcoming ticks. A running timer keeps
   * its interval until the next deactivate/activate cycle.
   */
  updateConfig(partial: Partial<ReminderConfig>): void {
    const next = { ...this.config, ...partial }
    this.directives = createDirectiveTable(next.directives)
    this.sinkChain = createSinkChain(next.sinks, { onSinkError: this.onSinkError })
    this.config = next
  }

  dispose(): void {
    this.deactivate()
  }

  /**
   * Run the tick logic once, independently of the timer.
   * @returns whether a reminder was handed to the sinks
   */
  remindNow(): boolean {
    return this.runTick()
  }

  private tick(): boolean {
    const active = this.activity.isActive()
    if (!active && !this.config.remindInactivity) {
      return false
    }

    const template = active ? this.config.messageTemplate : this.config.emptyText
    const body = renderTemplate(template, this.directives)
    this.sinkChain.notify(this.config.title, body)
    return true
  }

  private runTick(): boolean {
    try {
      return this.tick()
    } catch (err) {
      this.onTickError(err)
      return false
    }
  }

  private handleActivity(event: ActivityEvent): void {
    if (event === 'clock-in') {
      this.lifecycle.clockIn()
    } else {
      this.lifecycle.clockOut()
    }
  }
}
