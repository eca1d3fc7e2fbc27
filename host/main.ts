import { exec } from 'node:child_process'
import { ConfigStore } from './store/config-store'
import { applySettingChange } from './store/setting-change'
import { CommandConsole } from './console/command-console'
import { createDesktopNotifier } from './notifier/desktop-notifier'
import { buildReminderConfig, type ReminderRuntime } from './reminder-config'
import { ClockTracker } from '../src/services/activity/clock-tracker'
import { ReminderScheduler } from '../src/services/reminder/reminder-scheduler'
import { createSoundPlayer } from '../src/services/reminder/sound-player'
import { formatDuration } from '../src/services/reminder/clock-directives'
import { describeError } from '../src/services/reminder/reminder-errors'

const configStore = new ConfigStore({ watch: true })
const tracker = new ClockTracker()

const runtime: ReminderRuntime = {
  activity: tracker,
  deliver: createDesktopNotifier({ appName: 'Clock reminder' }),
  soundPlayer: createSoundPlayer({ exec }),
}

const scheduler = new ReminderScheduler(
  buildReminderConfig(configStore.getSettings(), runtime),
  { activity: tracker },
)

scheduler.getLifecycle().onStateChange((next, previous) => {
  console.info(`Reminder state: ${previous} -> ${next}`)
})

const stopWatchingSettings = configStore.onSettingsChanged((settings) => {
  scheduler.updateConfig(buildReminderConfig(settings, runtime))
})

function describeStatus(): string {
  const clock = tracker.getCurrent()
  const reminders = scheduler.isActive()
    ? `reminders on, every ${formatDuration(scheduler.getConfig().intervalMs / 60_000)}`
    : 'reminders off'
  const clocked = clock === null
    ? 'nothing clocked in'
    : `clocked in on "${clock.label}" for ${formatDuration(tracker.elapsedMinutes())}`
  return `${reminders}; ${clocked} (${scheduler.getState()})`
}

let isQuitting = false

function shutdown(): void {
  if (isQuitting) {
    return
  }
  isQuitting = true

  stopWatchingSettings()
  scheduler.dispose()
  commandConsole.destroy()
  tracker.clockOut()
  // conf keeps a file watcher open
  process.exit(0)
}

const commandConsole = new CommandConsole({
  onClockIn: (label) => {
    tracker.clockIn(label)
    return `Clocked in on "${label}"`
  },
  onClockOut: () => {
    const entry = tracker.clockOut()
    return entry === null
      ? 'Nothing is clocked in'
      : `Clocked out of "${entry.label}" after ${formatDuration(entry.minutes)}`
  },
  onActivate: () => {
    scheduler.activate()
    return describeStatus()
  },
  onDeactivate: () => {
    scheduler.deactivate()
    return describeStatus()
  },
  onToggle: () => {
    scheduler.toggle()
    return describeStatus()
  },
  onStatus: describeStatus,
  onRemind: () => (scheduler.remindNow() ? 'Reminder sent' : 'No reminder sent'),
  onSet: (change) => applySettingChange(configStore, change),
  onQuit: shutdown,
})

process.on('SIGINT', shutdown)
process.on('SIGTERM', shutdown)

console.info(`Settings: ${configStore.getPath()}`)

if (configStore.getSettings().reminder.autoActivate) {
  try {
    scheduler.activate()
  } catch (err) {
    console.error('Reminders not started:', describeError(err))
  }
}

commandConsole.start()
