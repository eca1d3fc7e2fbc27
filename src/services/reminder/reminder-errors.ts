import type { LifecycleState, LifecycleTrigger } from './reminder-types'

export class ConfigurationError extends Error {
  readonly field: string

  constructor(field: string, message: string) {
    super(`${field}: ${message}`)
    this.name = 'ConfigurationError'
    this.field = field
  }
}

export class DirectiveEvaluationError extends Error {
  readonly char: string

  constructor(char: string, cause: unknown) {
    super(`Directive %${char} failed: ${describeError(cause)}`, { cause })
    this.name = 'DirectiveEvaluationError'
    this.char = char
  }
}

export class SinkDeliveryError extends Error {
  readonly sinkIndex: number

  constructor(sinkIndex: number, cause: unknown) {
    super(`Sink #${sinkIndex} failed: ${describeError(cause)}`, { cause })
    this.name = 'SinkDeliveryError'
    this.sinkIndex = sinkIndex
  }
}

export class StateTransitionError extends Error {
  readonly from: LifecycleState
  readonly trigger: LifecycleTrigger

  constructor(from: LifecycleState, trigger: LifecycleTrigger) {
    super(`No transition from ${from} on ${trigger}`)
    this.name = 'StateTransitionError'
    this.from = from
    this.trigger = trigger
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
