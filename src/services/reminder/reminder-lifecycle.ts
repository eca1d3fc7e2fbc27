import type { LifecycleState, LifecycleTrigger } from './reminder-types'
import { StateTransitionError } from './reminder-errors'

export type LifecycleListener = (next: LifecycleState, previous: LifecycleState) => void

const TRANSITIONS: Readonly<
  Record<LifecycleState, Partial<Readonly<Record<LifecycleTrigger, LifecycleState>>>>
> = {
  dormant: { activate: 'clocked-out' },
  'clocked-out': { 'clock-in': 'clocked-in', deactivate: 'dormant' },
  'clocked-in': { 'clock-out': 'clocked-out', deactivate: 'dormant' },
}

export interface ReminderLifecycleOptions {
  readonly onViolation?: (error: StateTransitionError) => void
}

function logViolation(error: StateTransitionError): void {
  console.warn('Ignored lifecycle request:', error.message)
}

/**
 * Bookkeeping for whether reminders are running and whether something is
 * clocked in. Requests outside the transition table leave the state alone.
 */
export class ReminderLifecycle {
  private state: LifecycleState = 'dormant'
  private readonly listeners = new Set<LifecycleListener>()
  private readonly onViolation: (error: StateTransitionError) => void

  constructor(options?: ReminderLifecycleOptions) {
    this.onViolation = options?.onViolation ?? logViolation
  }

  getState(): LifecycleState {
    return this.state
  }

  activate(): void {
    // Repeated activation is expected, not a violation
    if (this.state !== 'dormant') {
      return
    }
    this.apply('activate')
  }

  deactivate(): void {
    if (this.state === 'dormant') {
      return
    }
    this.apply('deactivate')
  }

  clockIn(): void {
    this.apply('clock-in')
  }

  clockOut(): void {
    this.apply('clock-out')
  }

  onStateChange(listener: LifecycleListener): () => void {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  private apply(trigger: LifecycleTrigger): void {
    const previous = this.state
    const next = TRANSITIONS[previous][trigger]
    if (next === undefined) {
      this.onViolation(new StateTransitionError(previous, trigger))
      return
    }

    this.state = next
    for (const listener of this.listeners) {
      listener(next, previous)
    }
  }
}
