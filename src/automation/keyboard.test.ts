import { describe, expect, it } from 'vitest'
import { XdotoolKeyboard } from './keyboard.js'
import { FakeRunner } from '../testing/fake-runner.js'

describe('XdotoolKeyboard', () => {
  it('sends typed text on stdin, never as an argument', async () => {
    const runner = new FakeRunner()
    await new XdotoolKeyboard(runner, ['xdotool']).type('-s3cret')

    expect(runner.calls).toEqual([{ method: 'feed', argv: ['xdotool', 'type', '--file', '-'], input: '-s3cret' }])
  })

  it('presses named keys', async () => {
    const runner = new FakeRunner()
    await new XdotoolKeyboard(runner, ['xdotool']).key('Enter')

    expect(runner.calls).toEqual([{ method: 'feed', argv: ['xdotool', 'key', 'Enter'] }])
  })
})
