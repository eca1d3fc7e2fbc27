export interface ClockReminderSettings {
  readonly reminder: ReminderSettings
  readonly display: DisplaySettings
}

export interface ReminderSettings {
  readonly intervalMs: number
  readonly remindInactivity: boolean
  readonly title: string
  readonly messageTemplate: string
  readonly emptyText: string
  readonly sound: boolean
  readonly autoActivate: boolean
}

export interface DisplaySettings {
  readonly showIcons: boolean
  // null means the bundled icon
  readonly activeIconPath: string | null
  readonly inactiveIconPath: string | null
}

export const DEFAULT_SETTINGS: ClockReminderSettings = {
  reminder: {
    intervalMs: 600_000,
    remindInactivity: false,
    title: 'Clock reminder',
    messageTemplate: 'You are working on %h (%c)',
    emptyText: 'Nothing is clocked in',
    sound: false,
    autoActivate: true,
  },
  display: {
    showIcons: true,
    activeIconPath: null,
    inactiveIconPath: null,
  },
}
