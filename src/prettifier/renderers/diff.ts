/**
 * Built-in diff renderer: colors a unified diff line by line.
 */
import { Either } from 'effect'
import { RenderFailedError, type RenderError } from '../../effect/errors'
import { DIFF_FORMAT_ID } from '../detectors/diff'
import type { ContentRenderer } from '../registry'
import type {
  ContentBlock,
  RenderedContent,
  RendererConfig,
  StyledLine,
  ThemeColors,
} from '../types'

const FILE_HEADER = /^(diff --git |index |--- |\+\+\+ )/
const HUNK_HEADER = /^@@ /

function styleLine(text: string, theme: ThemeColors): StyledLine {
  if (FILE_HEADER.test(text)) {
    return { segments: [{ text, fg: theme.palette[15], bold: true }] }
  }
  if (HUNK_HEADER.test(text)) return { segments: [{ text, fg: theme.palette[6] }] }
  if (text.startsWith('+')) return { segments: [{ text, fg: theme.palette[2] }] }
  if (text.startsWith('-')) return { segments: [{ text, fg: theme.palette[1] }] }
  return { segments: [{ text }] }
}

export class DiffRenderer implements ContentRenderer {
  readonly formatId = DIFF_FORMAT_ID
  readonly displayName = 'Diff'
  readonly formatBadge = 'DIFF'

  render(
    content: ContentBlock,
    config: RendererConfig
  ): Either.Either<RenderedContent, RenderError> {
    const hasHeader = content.lines.some((text) => FILE_HEADER.test(text) || HUNK_HEADER.test(text))
    if (!hasHeader) {
      return Either.left(
        new RenderFailedError({ formatId: DIFF_FORMAT_ID, reason: 'No diff content found' })
      )
    }

    return Either.right({
      lines: content.lines.map((text) => styleLine(text, config.themeColors)),
      formatBadge: this.formatBadge,
      lineMapping: content.lines.map((_, i) => ({ renderedLine: i, sourceLine: i })),
    })
  }
}
