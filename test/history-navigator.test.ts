import { describe, expect, it } from 'vitest'
import { HistoryStore } from '../src/history'
import { HistoryNavigator } from '../src/history/history-navigator'

function storeOf(...commands: string[]): HistoryStore {
  const store = new HistoryStore(100)
  for (const command of commands)
    store.append(command)
  return store
}

describe('HistoryNavigator', () => {
  it('starts idle and ignores keys on empty history', () => {
    const nav = new HistoryNavigator(storeOf())
    expect(nav.isBrowsing()).toBe(false)
    expect(nav.up()).toBeUndefined()
    expect(nav.down()).toBeUndefined()
    expect(nav.getState()).toEqual({ kind: 'idle' })
  })

  it('walks from newest to oldest and stops at the oldest', () => {
    const nav = new HistoryNavigator(storeOf('a', 'b', 'c'))
    expect(nav.up()).toBe('c')
    expect(nav.getState()).toEqual({ kind: 'browsing', index: 2 })
    expect(nav.up()).toBe('b')
    expect(nav.up()).toBe('a')
    expect(nav.up()).toBeUndefined()
    expect(nav.getState()).toEqual({ kind: 'browsing', index: 0 })
  })

  it('leaves browsing with an empty line when moving past the newest entry', () => {
    const nav = new HistoryNavigator(storeOf('a', 'b', 'c'))
    nav.up()
    nav.up()
    nav.up()
    expect(nav.down()).toBe('b')
    expect(nav.down()).toBe('c')
    expect(nav.down()).toBe('')
    expect(nav.isBrowsing()).toBe(false)
    expect(nav.down()).toBeUndefined()
  })

  it('ignores Down when not browsing', () => {
    const nav = new HistoryNavigator(storeOf('a'))
    expect(nav.down()).toBeUndefined()
    expect(nav.isBrowsing()).toBe(false)
  })

  it('reset() returns to idle', () => {
    const nav = new HistoryNavigator(storeOf('a', 'b'))
    nav.up()
    nav.reset()
    expect(nav.isBrowsing()).toBe(false)
    expect(nav.up()).toBe('b')
  })
})
