/**
 * Fenced code block tracking (``` or ~~~).
 * Blank lines inside a fence must not split a block.
 */

type FenceChar = '`' | '~'

const LANGUAGE_TAG = /^[\p{L}\p{N}_+-]+$/u

function fenceLength(trimmed: string, ch: FenceChar): number {
  let n = 0
  while (n < trimmed.length && trimmed[n] === ch) n++
  return n
}

export class FenceTracker {
  private fenceChar: FenceChar | null = null

  get inFence(): boolean {
    return this.fenceChar !== null
  }

  /**
   * Update state from one line.
   * Opening: 3+ fence chars, optionally followed by a language tag.
   * Closing: 3+ of the same char with nothing else on the line.
   */
  update(line: string): void {
    const trimmed = line.trim()

    if (this.fenceChar !== null) {
      const len = fenceLength(trimmed, this.fenceChar)
      if (len >= 3 && trimmed.slice(len).trim() === '') {
        this.fenceChar = null
      }
      return
    }

    const ch: FenceChar | null = trimmed.startsWith('```')
      ? '`'
      : trimmed.startsWith('~~~')
        ? '~'
        : null
    if (ch === null) return

    const rest = trimmed.slice(fenceLength(trimmed, ch)).trim()
    if (rest === '' || LANGUAGE_TAG.test(rest)) {
      this.fenceChar = ch
    }
  }

  reset(): void {
    this.fenceChar = null
  }
}
