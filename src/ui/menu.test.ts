import { describe, expect, it } from 'vitest'
import { Menu } from './menu.js'
import { FakeRunner } from '../testing/fake-runner.js'

describe('Menu', () => {
  it('confirms on any answer other than cancel', async () => {
    const runner = new FakeRunner().reply('dmenu', 'Confirm\n', 'yes please\n')
    const menu = new Menu(runner, ['dmenu'])

    expect(await menu.confirm('Auto type password?')).toBe(true)
    expect(await menu.confirm('Auto type password?')).toBe(true)
    expect(runner.calls[0]).toEqual({
      method: 'capture',
      argv: ['dmenu', '-p', 'Auto type password?'],
      input: 'Confirm\nCancel',
    })
  })

  it('declines on Cancel in any case or an empty answer', async () => {
    const runner = new FakeRunner().reply('dmenu', 'Cancel\n', 'CANCEL\n')
    const menu = new Menu(runner, ['dmenu'])

    expect(await menu.confirm('Escalate to super user?')).toBe(false)
    expect(await menu.confirm('Escalate to super user?')).toBe(false)
    expect(await menu.confirm('Escalate to super user?')).toBe(false)
  })

  it('declines when the menu exits non-zero whatever it printed', async () => {
    const runner = new FakeRunner()
      .replyWith('dmenu', { stdout: 'Confirm\n', exitCode: 1 })
      .replyWith('dmenu', { stdout: 'Blue\n', exitCode: 1 })
    const menu = new Menu(runner, ['dmenu'])

    expect(await menu.confirm('Auto type password?')).toBe(false)
    expect(await menu.ask('Pick a prompt color:', ['Blue'], true)).toBe('')
  })

  it('asks case-insensitively when requested', async () => {
    const runner = new FakeRunner().reply('dmenu', 'Blue\n')

    expect(await new Menu(runner, ['dmenu']).ask('Pick a prompt color:', ['Red', 'Blue'], true)).toBe('Blue')
    expect(runner.calls[0].argv).toEqual(['dmenu', '-i', '-p', 'Pick a prompt color:'])
  })
})
