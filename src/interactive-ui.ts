import inquirer from 'inquirer'
import chalk from 'chalk'
import { Key } from 'node:readline'
import { TerminalSize, UpgradeCandidate } from './types'
import {
  bodyHeightFor,
  createSelectionState,
  fitViewport,
  reduce,
  ConfirmationInputHandler,
  DrawCommand,
  FALLBACK_PROMPT,
  InputHandler,
  MenuResult,
  parseIndexSelection,
  UIRenderer,
} from './ui'

const ENTER_ALT_SCREEN = '\x1b[?1049h'
const LEAVE_ALT_SCREEN = '\x1b[?1049l'
const HIDE_CURSOR = '\x1b[?25l'
const SHOW_CURSOR = '\x1b[?25h'

const CONFIRM_MESSAGE = 'Proceed with upgrade?'

export interface SelectOptions {
  fullscreen: boolean
}

export interface TerminalInput extends NodeJS.ReadableStream {
  isTTY?: boolean
  setRawMode?: (mode: boolean) => unknown
}

export interface TerminalOutput extends NodeJS.WritableStream {
  isTTY?: boolean
  columns?: number
  rows?: number
}

/**
 * Line-based prompts used whenever the keypress decoder is not attached
 */
export interface LinePrompts {
  ask(message: string): Promise<string>
  confirm(message: string): Promise<boolean>
}

export interface InteractiveUIOptions {
  input?: TerminalInput
  output?: TerminalOutput
  prompts?: LinePrompts
}

const inquirerPrompts: LinePrompts = {
  async ask(message) {
    const { answer } = await inquirer.prompt<{ answer: string }>([{ type: 'input', name: 'answer', message }])
    return answer
  },
  async confirm(message) {
    const { proceed } = await inquirer.prompt<{ proceed: boolean }>([
      { type: 'confirm', name: 'proceed', message, default: false },
    ])
    return proceed
  },
}

export class InteractiveUI {
  private renderer: UIRenderer
  private input: TerminalInput
  private output: TerminalOutput
  private prompts: LinePrompts
  // keypress never detaches its decoder, so once it is attached every
  // later prompt on this input has to go through keypress too
  private keypressAttached = false

  constructor(options: InteractiveUIOptions = {}) {
    this.renderer = new UIRenderer()
    this.input = options.input ?? process.stdin
    this.output = options.output ?? process.stdout
    this.prompts = options.prompts ?? inquirerPrompts
  }

  /**
   * Let the user pick candidates. Resolves with the chosen subset in display
   * order (possibly empty), or null when the user cancelled.
   */
  public async selectPackagesToUpgrade(
    candidates: readonly UpgradeCandidate[],
    options: SelectOptions
  ): Promise<UpgradeCandidate[] | null> {
    if (candidates.length === 0) {
      return []
    }

    const result =
      options.fullscreen && this.canUseFullscreen()
        ? await this.fullscreenSelector(candidates)
        : await this.fallbackSelector(candidates)

    return result === null ? null : result.map((index) => candidates[index])
  }

  /**
   * Ask before running pip. Defaults to no.
   */
  public async confirmUpgrade(): Promise<boolean> {
    if (!this.keypressAttached) {
      return this.prompts.confirm(CONFIRM_MESSAGE)
    }

    this.output.write(`${chalk.bold(CONFIRM_MESSAGE)} ${chalk.gray('[y/N]')} `)

    return new Promise((resolve) => {
      const inputHandler = new ConfirmationInputHandler((confirmed) => {
        this.input.removeListener('keypress', onKeypress)
        this.setRawMode(false)
        this.input.pause()
        this.output.write(`${confirmed ? 'y' : 'n'}\n`)
        resolve(confirmed)
      })

      const onKeypress = (str: string | undefined, key: Key | undefined) => {
        inputHandler.handleKeypress(str, key)
      }

      this.setRawMode(true)
      this.input.resume()
      this.input.on('keypress', onKeypress)
    })
  }

  public showSummary(chosen: readonly UpgradeCandidate[]): void {
    console.log(this.renderer.renderSelectionSummary(chosen))
  }

  private canUseFullscreen(): boolean {
    return this.input.isTTY === true && this.output.isTTY === true && typeof this.input.setRawMode === 'function'
  }

  private setRawMode(mode: boolean): void {
    if (typeof this.input.setRawMode !== 'function') {
      throw new Error('raw mode is not supported by this input')
    }
    this.input.setRawMode(mode)
  }

  private attachKeypress(): void {
    if (this.keypressAttached) return
    const keypress: (stream: NodeJS.ReadableStream) => void = require('keypress')
    keypress(this.input)
    this.keypressAttached = true
  }

  private getTerminalSize(): TerminalSize {
    const { columns, rows } = this.output
    return {
      columns: typeof columns === 'number' && columns > 0 ? columns : 80,
      rows: typeof rows === 'number' && rows > 0 ? rows : 24, // Fallback default
    }
  }

  private paint(commands: DrawCommand[]): void {
    let frame = '\x1b[H\x1b[2J'
    for (const command of commands) {
      const text = command.inverse ? `\x1b[7m${command.text}\x1b[27m` : command.text
      frame += `\x1b[${command.row + 1};${command.col + 1}H${text}`
    }
    this.output.write(frame)
  }

  private fullscreenSelector(candidates: readonly UpgradeCandidate[]): Promise<MenuResult> {
    return new Promise((resolve, reject) => {
      let state = createSelectionState(candidates.length)
      let rawMode = false
      let onAltScreen = false

      const renderInterface = () => {
        // Size is read on every frame so resizes take effect immediately
        const size = this.getTerminalSize()
        state = fitViewport(state, bodyHeightFor(size.rows))
        this.paint(this.renderer.renderMenu(state, candidates, size))
      }

      const inputHandler = new InputHandler((event) => {
        const transition = reduce(state, event, bodyHeightFor(this.getTerminalSize().rows))
        if (transition.type === 'done') {
          cleanup()
          resolve(transition.result)
          return
        }
        state = transition.state
        renderInterface()
      })

      const onKeypress = (str: string | undefined, key: Key | undefined) => {
        inputHandler.handleKeypress(str, key)
      }

      const cleanup = () => {
        this.input.removeListener('keypress', onKeypress)
        process.removeListener('SIGWINCH', renderInterface)
        if (onAltScreen) {
          this.output.write(SHOW_CURSOR + LEAVE_ALT_SCREEN)
          onAltScreen = false
        }
        if (rawMode) {
          this.setRawMode(false)
          rawMode = false
        }
        this.input.pause()
      }

      try {
        // Raw mode first: if it fails, keypress has not touched the input yet
        this.setRawMode(true)
        rawMode = true
        this.attachKeypress()
        this.output.write(ENTER_ALT_SCREEN + HIDE_CURSOR)
        onAltScreen = true
        this.input.resume()
        this.input.on('keypress', onKeypress)
        process.on('SIGWINCH', renderInterface)

        renderInterface()
      } catch (error) {
        cleanup()
        if (this.keypressAttached) {
          reject(error)
          return
        }
        // Fallback to simple interface if raw mode fails
        console.log(chalk.yellow(`Full-screen menu not available (${error}), using fallback interface...`))
        this.fallbackSelector(candidates).then(resolve, reject)
      }
    })
  }

  private async fallbackSelector(candidates: readonly UpgradeCandidate[]): Promise<MenuResult> {
    this.renderer.renderNumberedList(candidates).forEach((line) => console.log(line))
    console.log('')

    const answer = await this.prompts.ask(FALLBACK_PROMPT)
    return parseIndexSelection(answer, candidates.length)
  }
}
