import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { PassThrough, Writable } from 'stream'
import { InteractiveUI, LinePrompts } from '../src/interactive-ui'
import { candidate, stripAnsi } from './helpers'

class FakeKeyboard extends PassThrough {
  isTTY = true
  rawMode = false
  rawModeFails = false

  setRawMode(mode: boolean): this {
    if (this.rawModeFails) {
      throw new Error('EPERM')
    }
    this.rawMode = mode
    return this
  }
}

class FakeScreen extends Writable {
  isTTY = true
  columns = 60
  rows = 10
  writes: string[] = []

  _write(chunk: Buffer | string, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    this.writes.push(String(chunk))
    callback()
  }
}

const candidates = ['alpha', 'bravo', 'charlie', 'delta', 'echo'].map((name) => candidate(name, '1.0', '2.0'))

function tick(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 10))
}

async function type(keyboard: FakeKeyboard, ...keys: string[]): Promise<void> {
  for (const key of keys) {
    await tick()
    keyboard.write(key)
  }
}

function failingPrompts(): LinePrompts {
  return {
    ask: vi.fn(async () => {
      throw new Error('line prompt must not be used')
    }),
    confirm: vi.fn(async () => {
      throw new Error('line prompt must not be used')
    }),
  }
}

describe('InteractiveUI', () => {
  let keyboard: FakeKeyboard
  let screen: FakeScreen

  beforeEach(() => {
    keyboard = new FakeKeyboard()
    screen = new FakeScreen()
    vi.spyOn(console, 'log').mockImplementation(() => undefined)
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('selects in the full-screen menu and confirms with a single keystroke', async () => {
    const ui = new InteractiveUI({ input: keyboard, output: screen, prompts: failingPrompts() })

    const selection = ui.selectPackagesToUpgrade(candidates, { fullscreen: true })
    await type(keyboard, 'j', ' ', '\r')
    expect(await selection).toEqual([candidates[1]])
    expect(keyboard.rawMode).toBe(false)

    const answer = ui.confirmUpgrade()
    await type(keyboard, 'y')

    expect(await answer).toBe(true)
    expect(screen.writes.slice(-2).map(stripAnsi)).toEqual(['Proceed with upgrade? [y/N] ', 'y\n'])
    expect(keyboard.rawMode).toBe(false)
  })

  it('declines when Enter is pressed at the confirmation', async () => {
    const ui = new InteractiveUI({ input: keyboard, output: screen, prompts: failingPrompts() })

    const selection = ui.selectPackagesToUpgrade(candidates, { fullscreen: true })
    await type(keyboard, 'a', '\r')
    expect(await selection).toEqual(candidates)

    const answer = ui.confirmUpgrade()
    await type(keyboard, '\r')

    expect(await answer).toBe(false)
    expect(screen.writes[screen.writes.length - 1]).toBe('n\n')
  })

  it('resolves null when the menu is quit', async () => {
    const ui = new InteractiveUI({ input: keyboard, output: screen, prompts: failingPrompts() })

    const selection = ui.selectPackagesToUpgrade(candidates, { fullscreen: true })
    await type(keyboard, ' ', 'q')

    expect(await selection).toBeNull()
  })

  it('falls back to the numbered prompt on an untouched input when raw mode fails', async () => {
    keyboard.rawModeFails = true
    const listenersSeenByPrompt: number[] = []
    const prompts: LinePrompts = {
      ask: vi.fn(async () => {
        listenersSeenByPrompt.push(keyboard.listenerCount('data'), keyboard.listenerCount('newListener'))
        return '3'
      }),
      confirm: vi.fn(async () => true),
    }
    const ui = new InteractiveUI({ input: keyboard, output: screen, prompts })

    const chosen = await ui.selectPackagesToUpgrade(candidates, { fullscreen: true })

    expect(chosen).toEqual([candidates[2]])
    expect(listenersSeenByPrompt).toEqual([0, 0])
    expect(await ui.confirmUpgrade()).toBe(true)
    expect(prompts.confirm).toHaveBeenCalledWith('Proceed with upgrade?')
  })

  it('uses the line prompts when the menu is turned off', async () => {
    const prompts: LinePrompts = {
      ask: vi.fn(async () => '1 5'),
      confirm: vi.fn(async () => false),
    }
    const ui = new InteractiveUI({ input: keyboard, output: screen, prompts })

    const chosen = await ui.selectPackagesToUpgrade(candidates, { fullscreen: false })

    expect(chosen).toEqual([candidates[0], candidates[4]])
    expect(await ui.confirmUpgrade()).toBe(false)
    expect(screen.writes).toEqual([])
  })
})
