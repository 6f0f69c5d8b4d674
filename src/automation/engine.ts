/**
 * jumpkey — Automation Engine
 *
 * The fixed set of conveniences that type into the focused terminal:
 * enter a password, escalate with `sudo su`, recolor the prompt, clear
 * the screen. Every action except clearing asks first.
 *
 * Timing is a fixed set of pauses between keystrokes. Nothing waits for
 * the remote shell to actually be ready.
 */

import { setTimeout as delay } from 'node:timers/promises'
import type { Keyboard } from './keyboard.js'
import { promptCommand, type ColorName } from './palette.js'
import { silentLogger, type Logger } from '../log/debug-log.js'

// ── Timing ──────────────────────────────────────────────────────────────────

/** Between typing a line and pressing Enter */
export const KEY_DELAY_MS = 100
/** Between `sudo su` and the password that answers it */
export const ESCALATION_DELAY_MS = 500
/** Between consecutive actions of the post-connect sequence */
export const STEP_DELAY_MS = 100

export const ESCALATE_COMMAND = 'sudo su'
export const CLEAR_COMMAND = 'clear -x'

// ── Types ───────────────────────────────────────────────────────────────────

export type ActionResult = 'done' | 'declined'

export type AutomationDeps = {
  keyboard: Keyboard
  /** Confirm gate; false means the operator declined */
  confirm: (prompt: string) => Promise<boolean>
  /** Palette picker; undefined means cancelled */
  chooseColor: () => Promise<ColorName | undefined>
  sleep?: (ms: number) => Promise<void>
  logger?: Logger
}

// ── Engine ──────────────────────────────────────────────────────────────────

export class AutomationEngine {
  private readonly keyboard: Keyboard
  private readonly confirm: AutomationDeps['confirm']
  private readonly chooseColor: AutomationDeps['chooseColor']
  private readonly sleep: (ms: number) => Promise<void>
  private readonly logger: Logger

  constructor(deps: AutomationDeps) {
    this.keyboard = deps.keyboard
    this.confirm = deps.confirm
    this.chooseColor = deps.chooseColor
    this.sleep = deps.sleep ?? ((ms) => delay(ms))
    this.logger = deps.logger ?? silentLogger
  }

  async typeCredential(secret: string): Promise<ActionResult> {
    if (!(await this.confirm('Auto type password?'))) return this.declined('typeCredential')

    await this.keyboard.type(secret)
    await this.keyboard.key('Enter')
    this.logger.log('automation: typed credential')
    return 'done'
  }

  async escalatePrivilege(secret: string): Promise<ActionResult> {
    if (!(await this.confirm('Escalate to super user?'))) return this.declined('escalatePrivilege')

    await this.enterLine(ESCALATE_COMMAND)
    await this.sleep(ESCALATION_DELAY_MS)
    await this.enterLine(secret)
    this.logger.log('automation: escalated privilege')
    return 'done'
  }

  /**
   * Set a colored PS1. Without a color the operator picks one from the
   * palette; cancelling that picker declines the action.
   */
  async recolorPrompt(color?: ColorName): Promise<ActionResult> {
    const chosen = color ?? (await this.chooseColor())
    if (!chosen) return this.declined('recolorPrompt')

    await this.enterLine(promptCommand(chosen))
    this.logger.log('automation: recolored prompt', { color: chosen })
    return 'done'
  }

  async clearScreen(): Promise<ActionResult> {
    await this.enterLine(CLEAR_COMMAND)
    return 'done'
  }

  /**
   * Everything a fresh session gets: password, sudo, white prompt, clear.
   * Declining any step ends the sequence there.
   */
  async postConnect(secret: string): Promise<ActionResult> {
    if ((await this.typeCredential(secret)) === 'declined') return 'declined'
    if ((await this.escalatePrivilege(secret)) === 'declined') return 'declined'
    await this.sleep(STEP_DELAY_MS)
    if ((await this.recolorPrompt('White')) === 'declined') return 'declined'
    await this.sleep(STEP_DELAY_MS)
    return this.clearScreen()
  }

  private async enterLine(text: string): Promise<void> {
    await this.keyboard.type(text)
    await this.sleep(KEY_DELAY_MS)
    await this.keyboard.key('Enter')
  }

  private declined(action: string): ActionResult {
    this.logger.log(`automation: ${action} declined`)
    return 'declined'
  }
}
