import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { ClipboardGuard, DetachedClearScheduler, XclipClipboard, type ClearScheduler, type Clipboard } from './guard.js'
import { FakeRunner } from '../testing/fake-runner.js'

class MemoryClipboard implements Clipboard {
  content = 'untouched'

  async set(text: string): Promise<void> {
    this.content = text
  }
}

/** Timer-backed scheduler; nothing holds a reference back to the guard */
function timerScheduler(clipboard: MemoryClipboard): ClearScheduler {
  return {
    scheduleClear(afterSeconds) {
      setTimeout(() => {
        clipboard.content = ''
      }, afterSeconds * 1000)
    },
  }
}

describe('ClipboardGuard', () => {
  beforeEach(() => {
    vi.useFakeTimers()
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  it('copies a secret and clears it ten seconds later', async () => {
    const clipboard = new MemoryClipboard()
    const guard = new ClipboardGuard(clipboard, timerScheduler(clipboard))

    await guard.copySensitive('secret123\n')
    expect(clipboard.content).toBe('secret123')

    vi.advanceTimersByTime(9_999)
    expect(clipboard.content).toBe('secret123')

    vi.advanceTimersByTime(1)
    expect(clipboard.content).toBe('')
  })

  it('leaves plain copies in place', async () => {
    const clipboard = new MemoryClipboard()
    const guard = new ClipboardGuard(clipboard, timerScheduler(clipboard))

    await guard.copyPlain('10.0.0.5')
    vi.advanceTimersByTime(60_000)
    expect(clipboard.content).toBe('10.0.0.5')
  })
})

describe('xclip wiring', () => {
  const argv = ['xclip', '-selection', 'clipboard']

  it('feeds the text to the clipboard tool', async () => {
    const runner = new FakeRunner()
    await new XclipClipboard(runner, argv).set('secret123')

    expect(runner.calls).toEqual([{ method: 'feed', argv, input: 'secret123' }])
  })

  it('schedules the clear in a detached shell', () => {
    const runner = new FakeRunner()
    new DetachedClearScheduler(runner, argv).scheduleClear(10)

    expect(runner.calls).toEqual([
      {
        method: 'detached',
        argv: ['sh', '-c', 'sleep "$0" && exec "$@" < /dev/null', '10', 'xclip', '-selection', 'clipboard'],
      },
    ])
  })

  it('copySensitive sets the clipboard before scheduling the clear', async () => {
    const runner = new FakeRunner()
    const guard = new ClipboardGuard(new XclipClipboard(runner, argv), new DetachedClearScheduler(runner, argv))

    await guard.copySensitive('secret123')
    expect(runner.calls.map((call) => call.method)).toEqual(['feed', 'detached'])
  })
})
