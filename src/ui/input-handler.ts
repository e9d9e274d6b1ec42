import type { Key } from 'node:readline'
import type { MenuEvent } from './state'

/**
 * Translate a keypress into a menu event. Unbound keys return null.
 */
export function keyToEvent(str: string | undefined, key: Key | undefined): MenuEvent | null {
  if (key?.ctrl && key.name === 'c') {
    return { type: 'quit' }
  }

  if (str === ' ' || key?.name === 'space') {
    return { type: 'toggle' }
  }

  // keypress reports Shift+G as name 'g'
  if (str === 'G' || (key?.name === 'g' && key.shift)) {
    return { type: 'end' }
  }

  switch (key?.name ?? str) {
    case 'q':
    case 'Q':
    case 'escape':
      return { type: 'quit' }

    case 'up':
    case 'k':
    case 'K':
      return { type: 'navigate_up' }

    case 'down':
    case 'j':
    case 'J':
      return { type: 'navigate_down' }

    case 'pageup':
      return { type: 'page_up' }

    case 'pagedown':
      return { type: 'page_down' }

    case 'home':
    case 'g':
      return { type: 'home' }

    case 'end':
      return { type: 'end' }

    case 'a':
    case 'A':
      return { type: 'select_all' }

    case 'n':
    case 'N':
      return { type: 'select_none' }

    case 'return':
    case 'enter':
    case '\r':
    case '\n':
      return { type: 'confirm' }
  }

  return null
}

export class InputHandler {
  private onEvent: (event: MenuEvent) => void

  constructor(onEvent: (event: MenuEvent) => void) {
    this.onEvent = onEvent
  }

  handleKeypress(str: string | undefined, key: Key | undefined): void {
    const event = keyToEvent(str, key)
    if (event) {
      this.onEvent(event)
    }
  }
}

/**
 * y/Y accepts. Enter, n, Esc and Ctrl+C decline. Anything else is ignored.
 */
export function keyToConfirmation(str: string | undefined, key: Key | undefined): boolean | null {
  if (key?.ctrl && key.name === 'c') {
    return false
  }

  switch (key?.name ?? str) {
    case 'y':
    case 'Y':
      return true

    case 'n':
    case 'N':
    case 'escape':
    case 'return':
    case 'enter':
    case '\r':
    case '\n':
      return false
  }

  return null
}

export class ConfirmationInputHandler {
  private onConfirm: (confirmed: boolean) => void
  private answered = false

  constructor(onConfirm: (confirmed: boolean) => void) {
    this.onConfirm = onConfirm
  }

  handleKeypress(str: string | undefined, key: Key | undefined): void {
    const confirmed = keyToConfirmation(str, key)
    if (confirmed === null || this.answered) {
      return
    }
    this.answered = true
    this.onConfirm(confirmed)
  }
}
