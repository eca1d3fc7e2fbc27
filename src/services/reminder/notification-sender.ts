import type { ActivitySource, ReminderConfig, ReminderSink } from './reminder-types'

export interface NotificationContent {
  readonly title: string
  readonly body: string
  readonly icon?: string
}

export type IconSettings = Pick<ReminderConfig, 'showIcons' | 'activeIconPath' | 'inactiveIconPath'>

export interface NotificationSinkOptions {
  readonly deliver: (content: NotificationContent) => void
  readonly activity: Pick<ActivitySource, 'isActive'>
  readonly icons: IconSettings
}

export function selectNotificationIcon(icons: IconSettings, active: boolean): string | null {
  if (!icons.showIcons) {
    return null
  }
  return active ? icons.activeIconPath : icons.inactiveIconPath
}

export function buildNotificationContent(
  title: string,
  body: string,
  icon: string | null,
): NotificationContent {
  return icon === null ? { title, body } : { title, body, icon }
}

export function createNotificationSink(options: NotificationSinkOptions): ReminderSink {
  return (title: string, body: string): void => {
    const icon = selectNotificationIcon(options.icons, options.activity.isActive())
    options.deliver(buildNotificationContent(title, body, icon))
  }
}
