import { createInterface, type Interface } from 'node:readline'
import { describeError } from '@/services/reminder/reminder-errors'

export type SettingChange =
  | { readonly key: 'interval'; readonly minutes: number }
  | { readonly key: 'inactive' | 'sound' | 'icons'; readonly enabled: boolean }

export type ConsoleCommand =
  | { readonly kind: 'clock-in'; readonly label: string }
  | { readonly kind: 'set'; readonly change: SettingChange }
  | { readonly kind: 'clock-out' }
  | { readonly kind: 'activate' }
  | { readonly kind: 'deactivate' }
  | { readonly kind: 'toggle' }
  | { readonly kind: 'status' }
  | { readonly kind: 'remind' }
  | { readonly kind: 'help' }
  | { readonly kind: 'quit' }
  | { readonly kind: 'empty' }
  | { readonly kind: 'invalid'; readonly message: string }

export interface ConsoleCallbacks {
  onClockIn: (label: string) => string
  onClockOut: () => string
  onActivate: () => string
  onDeactivate: () => string
  onToggle: () => string
  onStatus: () => string
  onRemind: () => string
  onSet: (change: SettingChange) => string
  onQuit: () => void
}

export interface CommandConsoleOptions {
  readonly input?: NodeJS.ReadableStream
  readonly output?: NodeJS.WritableStream
  readonly prompt?: string
}

const SIMPLE_COMMANDS: Readonly<Record<string, ConsoleCommand>> = {
  out: { kind: 'clock-out' },
  on: { kind: 'activate' },
  activate: { kind: 'activate' },
  off: { kind: 'deactivate' },
  deactivate: { kind: 'deactivate' },
  toggle: { kind: 'toggle' },
  status: { kind: 'status' },
  remind: { kind: 'remind' },
  help: { kind: 'help' },
  quit: { kind: 'quit' },
  exit: { kind: 'quit' },
}

export const HELP_TEXT = [
  'in <label>                       start clocking a task',
  'out                              stop the running clock',
  'on | off                         start or stop reminders',
  'toggle                           switch reminders on or off',
  'status                           show reminder and clock state',
  'remind                           show a reminder now',
  'set interval <minutes>           change the reminder interval',
  'set inactive|sound|icons on|off  remind when idle, play a sound, show icons',
  'quit                             exit',
].join('\n')

const SET_USAGE = 'Usage: set interval <minutes> | set inactive|sound|icons on|off'

function parseSetting(args: readonly string[]): ConsoleCommand {
  const [key = '', value = '', ...extra] = args.map((arg) => arg.toLowerCase())
  if (extra.length > 0) {
    return { kind: 'invalid', message: SET_USAGE }
  }

  if (key === 'interval') {
    const minutes = Number(value)
    if (Number.isFinite(minutes) && minutes > 0) {
      return { kind: 'set', change: { key, minutes } }
    }
  } else if (key === 'inactive' || key === 'sound' || key === 'icons') {
    if (value === 'on' || value === 'off') {
      return { kind: 'set', change: { key, enabled: value === 'on' } }
    }
  }
  return { kind: 'invalid', message: SET_USAGE }
}

export function parseCommand(line: string): ConsoleCommand {
  const trimmed = line.trim()
  if (!trimmed) {
    return { kind: 'empty' }
  }

  const [head, ...rest] = trimmed.split(/\s+/)
  const name = head.toLowerCase()

  if (name === 'in') {
    const label = rest.join(' ')
    return label
      ? { kind: 'clock-in', label }
      : { kind: 'invalid', message: 'Usage: in <label>' }
  }

  if (name === 'set') {
    return parseSetting(rest)
  }

  const command = SIMPLE_COMMANDS[name]
  if (command === undefined) {
    return { kind: 'invalid', message: `Unknown command "${head}", type help` }
  }
  return command
}

export class CommandConsole {
  private readline: Interface | null = null
  private readonly callbacks: ConsoleCallbacks
  private readonly options: CommandConsoleOptions
  private quitting = false

  constructor(callbacks: ConsoleCallbacks, options?: CommandConsoleOptions) {
    this.callbacks = callbacks
    this.options = options ?? {}
  }

  start(): void {
    if (this.readline) return

    const output = this.options.output ?? process.stdout
    const readline = createInterface({
      input: this.options.input ?? process.stdin,
      output,
      prompt: this.options.prompt ?? 'clock> ',
    })
    readline.on('line', (line) => {
      const reply = this.handle(line)
      if (reply) {
        output.write(reply + '\n')
      }
      if (!this.quitting) {
        readline.prompt()
      }
    })
    readline.on('SIGINT', () => this.quit())
    readline.on('close', () => this.quit())
    this.readline = readline
    readline.prompt()
  }

  /**
   * Run one command line and return the text to show, if any.
   */
  handle(line: string): string | null {
    const command = parseCommand(line)
    try {
      return this.dispatch(command)
    } catch (err) {
      return `Error: ${describeError(err)}`
    }
  }

  destroy(): void {
    this.quitting = true
    this.readline?.close()
    this.readline = null
  }

  private dispatch(command: ConsoleCommand): string | null {
    switch (command.kind) {
      case 'clock-in':
        return this.callbacks.onClockIn(command.label)
      case 'clock-out':
        return this.callbacks.onClockOut()
      case 'activate':
        return this.callbacks.onActivate()
      case 'deactivate':
        return this.callbacks.onDeactivate()
      case 'toggle':
        return this.callbacks.onToggle()
      case 'status':
        return this.callbacks.onStatus()
      case 'remind':
        return this.callbacks.onRemind()
      case 'set':
        return this.callbacks.onSet(command.change)
      case 'help':
        return HELP_TEXT
      case 'quit':
        this.quit()
        return null
      case 'empty':
        return null
      case 'invalid':
        return command.message
    }
  }

  private quit(): void {
    if (this.quitting) return
    this.quitting = true
    this.callbacks.onQuit()
  }
}
