import notifier from 'node-notifier'
import type { NotificationContent } from '@/services/reminder/notification-sender'

export interface DesktopNotifierOptions {
  readonly appName?: string
}

/**
 * Hand a notification to the operating system. Delivery is best-effort:
 * failures are logged from the notifier callback and never thrown.
 */
export function createDesktopNotifier(
  options?: DesktopNotifierOptions,
): (content: NotificationContent) => void {
  return (content) => {
    notifier.notify(
      {
        title: content.title,
        message: content.body,
        icon: content.icon,
        appID: options?.appName,
        wait: false,
      },
      (err) => {
        if (err) {
          console.error('Notification delivery failed:', err.message)
        }
      },
    )
  }
}
