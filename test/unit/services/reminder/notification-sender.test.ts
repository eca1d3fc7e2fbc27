import { describe, it, expect, vi } from 'vitest'
import {
  buildNotificationContent,
  createNotificationSink,
  selectNotificationIcon,
  type IconSettings,
} from '../../../../src/services/reminder/notification-sender'

// ─── helpers ───

const icons: IconSettings = {
  showIcons: true,
  activeIconPath: '/icons/active.png',
  inactiveIconPath: '/icons/inactive.png',
}

// ─── selectNotificationIcon (pure function) ───

describe('selectNotificationIcon', () => {
  it('should pick the active icon while clocked in', () => {
    expect(selectNotificationIcon(icons, true)).toBe('/icons/active.png')
  })

  it('should pick the inactive icon while clocked out', () => {
    expect(selectNotificationIcon(icons, false)).toBe('/icons/inactive.png')
  })

  it('should return null when icons are disabled', () => {
    expect(selectNotificationIcon({ ...icons, showIcons: false }, true)).toBeNull()
  })

  it('should return null when the chosen icon is not set', () => {
    expect(selectNotificationIcon({ ...icons, inactiveIconPath: null }, false)).toBeNull()
  })
})

describe('buildNotificationContent', () => {
  it('should include the icon when given', () => {
    expect(buildNotificationContent('Clock reminder', 'On Review', '/icons/active.png')).toEqual({
      title: 'Clock reminder',
      body: 'On Review',
      icon: '/icons/active.png',
    })
  })

  it('should omit the icon key when there is none', () => {
    const content = buildNotificationContent('Clock reminder', 'On Review', null)
    expect(content).toEqual({ title: 'Clock reminder', body: 'On Review' })
    expect('icon' in content).toBe(false)
  })
})

// ─── createNotificationSink ───

describe('createNotificationSink', () => {
  it('should deliver title, body and active icon while clocked in', () => {
    const deliver = vi.fn()
    const sink = createNotificationSink({ deliver, activity: { isActive: () => true }, icons })

    sink('Clock reminder', 'You are working on Review (0:10)')

    expect(deliver).toHaveBeenCalledOnce()
    expect(deliver).toHaveBeenCalledWith({
      title: 'Clock reminder',
      body: 'You are working on Review (0:10)',
      icon: '/icons/active.png',
    })
  })

  it('should use the inactive icon while clocked out', () => {
    const deliver = vi.fn()
    const sink = createNotificationSink({ deliver, activity: { isActive: () => false }, icons })

    sink('Clock reminder', 'Nothing is clocked in')

    expect(deliver).toHaveBeenCalledWith({
      title: 'Clock reminder',
      body: 'Nothing is clocked in',
      icon: '/icons/inactive.png',
    })
  })

  it('should check activity at delivery time', () => {
    const deliver = vi.fn()
    let active = false
    const sink = createNotificationSink({ deliver, activity: { isActive: () => active }, icons })

    sink('t', 'b')
    active = true
    sink('t', 'b')

    expect(deliver.mock.calls.map(([content]) => content.icon)).toEqual([
      '/icons/inactive.png',
      '/icons/active.png',
    ])
  })

  it('should propagate delivery errors to the caller', () => {
    const deliver = vi.fn(() => {
      throw new Error('no display')
    })
    const sink = createNotificationSink({ deliver, activity: { isActive: () => true }, icons })

    expect(() => sink('t', 'b')).toThrow('no display')
  })
})
