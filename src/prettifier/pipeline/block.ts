/**
 * A detected block with its dual-view buffer.
 */
import type { RowRange } from '../../core/row-range'
import type { BlockId, Fingerprint, ViewMode } from '../../effect/types'
import type { DualViewBuffer } from '../buffer'
import { rowRangeOf, type ContentBlock, type DetectionResult } from '../types'

export class PrettifiedBlock {
  constructor(
    readonly blockId: BlockId,
    readonly detection: DetectionResult,
    readonly buffer: DualViewBuffer
  ) {}

  get content(): ContentBlock {
    return this.buffer.source
  }

  get rowRange(): RowRange {
    return rowRangeOf(this.buffer.source)
  }

  get viewMode(): ViewMode {
    return this.buffer.viewMode
  }

  get hasRendered(): boolean {
    return this.buffer.renderedContent !== null
  }

  get fingerprint(): Fingerprint {
    return this.buffer.fingerprint
  }
}
