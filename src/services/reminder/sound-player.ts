import type { ReminderSink } from './reminder-types'

type ExecCallback = (err: Error | null) => void
type ExecFn = (command: string, callback: ExecCallback) => void

export interface SoundPlayerOptions {
  readonly exec: ExecFn
  readonly platform?: NodeJS.Platform
  readonly soundPath?: string
}

export interface SoundPlayer {
  playAlertSound(): void
}

const PLATFORM_PLAYERS: Partial<Readonly<Record<NodeJS.Platform, { command: string; sound: string }>>> = {
  darwin: { command: 'afplay', sound: '/System/Library/Sounds/Tink.aiff' },
  linux: { command: 'paplay', sound: '/usr/share/sounds/freedesktop/stereo/bell.oga' },
}

export function createSoundPlayer(options: SoundPlayerOptions): SoundPlayer {
  const player = PLATFORM_PLAYERS[options.platform ?? process.platform]

  return {
    playAlertSound(): void {
      if (player === undefined) {
        return
      }
      const soundPath = options.soundPath ?? player.sound
      options.exec(`${player.command} "${soundPath}"`, (err) => {
        if (err) {
          console.error('Sound playback failed:', err.message)
        }
      })
    },
  }
}

export function createSoundSink(player: SoundPlayer): ReminderSink {
  return () => {
    player.playAlertSound()
  }
}
