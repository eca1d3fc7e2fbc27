import type { ReminderSink } from './reminder-types'
import { SinkDeliveryError } from './reminder-errors'

export interface SinkChainOptions {
  readonly onSinkError?: (error: SinkDeliveryError) => void
}

export interface SinkChain {
  readonly size: number
  notify(title: string, body: string): void
}

function logSinkError(error: SinkDeliveryError): void {
  console.error('Reminder sink failed:', error.message)
}

export function createSinkChain(
  sinks: readonly ReminderSink[],
  options?: SinkChainOptions,
): SinkChain {
  const chain = [...sinks]
  const onSinkError = options?.onSinkError ?? logSinkError

  return {
    size: chain.length,
    notify(title: string, body: string): void {
      chain.forEach((sink, index) => {
        try {
          sink(title, body)
        } catch (err) {
          onSinkError(new SinkDeliveryError(index, err))
        }
      })
    },
  }
}
