import { fileURLToPath } from 'node:url'
import type { ClockReminderSettings } from '@/types/settings'
import type { ActivitySource, ReminderConfig, ReminderSink } from '@/services/reminder/reminder-types'
import { createClockDirectives } from '@/services/reminder/clock-directives'
import {
  createNotificationSink,
  type NotificationContent,
} from '@/services/reminder/notification-sender'
import { createSoundSink, type SoundPlayer } from '@/services/reminder/sound-player'

export const BUNDLED_ICONS = {
  active: fileURLToPath(new URL('./assets/icons/clock-active.png', import.meta.url)),
  inactive: fileURLToPath(new URL('./assets/icons/clock-inactive.png', import.meta.url)),
} as const

export interface ReminderRuntime {
  readonly activity: ActivitySource
  readonly deliver: (content: NotificationContent) => void
  readonly soundPlayer?: SoundPlayer
}

export function buildReminderConfig(
  settings: ClockReminderSettings,
  runtime: ReminderRuntime,
): ReminderConfig {
  const { reminder, display } = settings
  const icons = {
    showIcons: display.showIcons,
    activeIconPath: display.activeIconPath ?? BUNDLED_ICONS.active,
    inactiveIconPath: display.inactiveIconPath ?? BUNDLED_ICONS.inactive,
  }

  const sinks: ReminderSink[] = [
    createNotificationSink({ deliver: runtime.deliver, activity: runtime.activity, icons }),
  ]
  if (reminder.sound && runtime.soundPlayer !== undefined) {
    sinks.push(createSoundSink(runtime.soundPlayer))
  }

  return {
    intervalMs: reminder.intervalMs,
    remindInactivity: reminder.remindInactivity,
    title: reminder.title,
    messageTemplate: reminder.messageTemplate,
    emptyText: reminder.emptyText,
    ...icons,
    directives: createClockDirectives(runtime.activity),
    sinks,
  }
}
