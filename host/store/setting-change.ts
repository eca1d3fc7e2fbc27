import type { ConfigStore } from './config-store'
import type { SettingChange } from '../console/command-console'
import { validateInterval } from '@/services/reminder/reminder-scheduler'

export type SettingsWriter = Pick<ConfigStore, 'updateReminder' | 'updateDisplay'>

const MS_PER_MINUTE = 60_000

function onOff(enabled: boolean): string {
  return enabled ? 'on' : 'off'
}

/**
 * Persist one console setting change and describe it. Saved settings reach a
 * running scheduler through the store's change listener.
 */
export function applySettingChange(store: SettingsWriter, change: SettingChange): string {
  switch (change.key) {
    case 'interval': {
      const intervalMs = Math.round(change.minutes * MS_PER_MINUTE)
      validateInterval(intervalMs)
      store.updateReminder({ intervalMs })
      return `Interval set to ${change.minutes} min, used from the next activation`
    }
    case 'inactive':
      store.updateReminder({ remindInactivity: change.enabled })
      return `Reminders while idle ${onOff(change.enabled)}`
    case 'sound':
      store.updateReminder({ sound: change.enabled })
      return `Reminder sound ${onOff(change.enabled)}`
    case 'icons':
      store.updateDisplay({ showIcons: change.enabled })
      return `Notification icons ${onOff(change.enabled)}`
  }
}
