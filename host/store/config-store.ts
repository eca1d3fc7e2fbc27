import Conf from 'conf'
import {
  DEFAULT_SETTINGS,
  type ClockReminderSettings,
  type DisplaySettings,
  type ReminderSettings,
} from '@/types/settings'

type StoreSchema = {
  settings: ClockReminderSettings
}

export interface ConfigStoreOptions {
  readonly cwd?: string
  readonly watch?: boolean
}

export class ConfigStore {
  private readonly store: Conf<StoreSchema>

  constructor(options?: ConfigStoreOptions) {
    this.store = new Conf<StoreSchema>({
      projectName: 'clock-reminder',
      cwd: options?.cwd,
      defaults: {
        settings: DEFAULT_SETTINGS,
      },
      clearInvalidConfig: true,
      watch: options?.watch ?? false,
    })
  }

  getSettings(): ClockReminderSettings {
    const stored = this.store.get('settings', DEFAULT_SETTINGS)
    // Files written by older versions may lack newer keys
    return {
      reminder: { ...DEFAULT_SETTINGS.reminder, ...stored.reminder },
      display: { ...DEFAULT_SETTINGS.display, ...stored.display },
    }
  }

  setSettings(settings: ClockReminderSettings): void {
    this.store.set('settings', settings)
  }

  updateReminder(partial: Partial<ReminderSettings>): ClockReminderSettings {
    const current = this.getSettings()
    const next = { ...current, reminder: { ...current.reminder, ...partial } }
    this.setSettings(next)
    return next
  }

  updateDisplay(partial: Partial<DisplaySettings>): ClockReminderSettings {
    const current = this.getSettings()
    const next = { ...current, display: { ...current.display, ...partial } }
    this.setSettings(next)
    return next
  }

  onSettingsChanged(listener: (settings: ClockReminderSettings) => void): () => void {
    return this.store.onDidChange('settings', () => {
      listener(this.getSettings())
    })
  }

  getPath(): string {
    return this.store.path
  }

  clear(): void {
    this.store.clear()
  }
}
