import { describe, it, expect, vi } from 'vitest'
import { BUNDLED_ICONS, buildReminderConfig } from '@host/reminder-config'
import { DEFAULT_SETTINGS, type ClockReminderSettings } from '@/types/settings'
import { ClockTracker } from '@/services/activity/clock-tracker'
import { renderTemplate } from '@/services/reminder/formatter'

function settingsWith(overrides: {
  reminder?: Partial<ClockReminderSettings['reminder']>
  display?: Partial<ClockReminderSettings['display']>
}): ClockReminderSettings {
  return {
    reminder: { ...DEFAULT_SETTINGS.reminder, ...overrides.reminder },
    display: { ...DEFAULT_SETTINGS.display, ...overrides.display },
  }
}

describe('buildReminderConfig', () => {
  it('should copy reminder settings', () => {
    const config = buildReminderConfig(
      settingsWith({ reminder: { intervalMs: 300_000, remindInactivity: true, title: 'Hey' } }),
      { activity: new ClockTracker(), deliver: vi.fn() },
    )

    expect(config.intervalMs).toBe(300_000)
    expect(config.remindInactivity).toBe(true)
    expect(config.title).toBe('Hey')
    expect(config.messageTemplate).toBe('You are working on %h (%c)')
    expect(config.emptyText).toBe('Nothing is clocked in')
  })

  it('should fall back to the bundled icons', () => {
    const config = buildReminderConfig(DEFAULT_SETTINGS, {
      activity: new ClockTracker(),
      deliver: vi.fn(),
    })

    expect(config.activeIconPath).toBe(BUNDLED_ICONS.active)
    expect(config.inactiveIconPath).toBe(BUNDLED_ICONS.inactive)
    expect(BUNDLED_ICONS.active.endsWith('clock-active.png')).toBe(true)
  })

  it('should keep configured icon paths', () => {
    const config = buildReminderConfig(
      settingsWith({ display: { activeIconPath: '/icons/on.png', inactiveIconPath: '/icons/off.png' } }),
      { activity: new ClockTracker(), deliver: vi.fn() },
    )

    expect(config.activeIconPath).toBe('/icons/on.png')
    expect(config.inactiveIconPath).toBe('/icons/off.png')
  })

  it('should wire the clock directives to the activity source', () => {
    let now = 0
    const tracker = new ClockTracker({ now: () => now })
    const config = buildReminderConfig(DEFAULT_SETTINGS, { activity: tracker, deliver: vi.fn() })

    tracker.clockIn('Review')
    now += 70 * 60_000

    expect(renderTemplate(config.messageTemplate, config.directives)).toBe(
      'You are working on Review (1:10)',
    )
  })

  it('should register only the notification sink by default', () => {
    const deliver = vi.fn()
    const config = buildReminderConfig(DEFAULT_SETTINGS, {
      activity: new ClockTracker(),
      deliver,
      soundPlayer: { playAlertSound: vi.fn() },
    })

    expect(config.sinks).toHaveLength(1)
    config.sinks[0]('Clock reminder', 'Nothing is clocked in')
    expect(deliver).toHaveBeenCalledWith({
      title: 'Clock reminder',
      body: 'Nothing is clocked in',
      icon: BUNDLED_ICONS.inactive,
    })
  })

  it('should omit the icon when icons are disabled', () => {
    const deliver = vi.fn()
    const config = buildReminderConfig(settingsWith({ display: { showIcons: false } }), {
      activity: new ClockTracker(),
      deliver,
    })

    config.sinks[0]('Clock reminder', 'Nothing is clocked in')

    expect(deliver).toHaveBeenCalledWith({ title: 'Clock reminder', body: 'Nothing is clocked in' })
  })

  it('should add the sound sink after the notification sink when enabled', () => {
    const order: string[] = []
    const config = buildReminderConfig(settingsWith({ reminder: { sound: true } }), {
      activity: new ClockTracker(),
      deliver: () => order.push('notify'),
      soundPlayer: { playAlertSound: () => order.push('sound') },
    })

    config.sinks.forEach((sink) => sink('t', 'b'))

    expect(order).toEqual(['notify', 'sound'])
  })

  it('should skip the sound sink without a player', () => {
    const config = buildReminderConfig(settingsWith({ reminder: { sound: true } }), {
      activity: new ClockTracker(),
      deliver: vi.fn(),
    })

    expect(config.sinks).toHaveLength(1)
  })
})
