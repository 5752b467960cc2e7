/**
 * Built-in JSON renderer: re-indents the parsed value with highlighted keys
 * and scalars.
 */
import { Either } from 'effect'
import { RenderFailedError, type RenderError } from '../../effect/errors'
import { JSON_FORMAT_ID } from '../detectors/json'
import type { ContentRenderer } from '../registry'
import {
  fullText,
  type ContentBlock,
  type RenderedContent,
  type RendererConfig,
  type StyledLine,
  type StyledSegment,
  type ThemeColors,
} from '../types'

const INDENT = '  '

const line = (segments: readonly StyledSegment[]): StyledLine => ({
  segments: segments.filter((segment) => segment.text !== ''),
})

const indent = (depth: number): StyledSegment => ({ text: INDENT.repeat(depth) })

function scalarSegment(value: unknown, theme: ThemeColors): StyledSegment {
  if (typeof value === 'string') return { text: JSON.stringify(value), fg: theme.palette[2] }
  if (typeof value === 'number') return { text: String(value), fg: theme.palette[11] }
  if (typeof value === 'boolean') return { text: String(value), fg: theme.palette[5] }
  return { text: 'null', fg: theme.palette[8], italic: true }
}

/**
 * Append the lines for `value`. `lead` goes before the value on its first
 * line, `trail` after it on its last.
 */
function renderValue(
  value: unknown,
  depth: number,
  lead: readonly StyledSegment[],
  trail: string,
  theme: ThemeColors,
  out: StyledLine[]
): void {
  if (Array.isArray(value)) {
    const items: readonly unknown[] = value
    if (items.length === 0) {
      out.push(line([...lead, { text: `[]${trail}` }]))
      return
    }
    out.push(line([...lead, { text: '[' }]))
    items.forEach((item, i) => {
      renderValue(item, depth + 1, [indent(depth + 1)], i < items.length - 1 ? ',' : '', theme, out)
    })
    out.push(line([indent(depth), { text: `]${trail}` }]))
    return
  }

  if (typeof value === 'object' && value !== null) {
    const entries = Object.entries(value)
    if (entries.length === 0) {
      out.push(line([...lead, { text: `{}${trail}` }]))
      return
    }
    out.push(line([...lead, { text: '{' }]))
    entries.forEach(([key, item], i) => {
      const keyLead: StyledSegment[] = [
        indent(depth + 1),
        { text: JSON.stringify(key), fg: theme.palette[6] },
        { text: ': ' },
      ]
      renderValue(item, depth + 1, keyLead, i < entries.length - 1 ? ',' : '', theme, out)
    })
    out.push(line([indent(depth), { text: `}${trail}` }]))
    return
  }

  out.push(line([...lead, scalarSegment(value, theme), { text: trail }]))
}

export class JsonRenderer implements ContentRenderer {
  readonly formatId = JSON_FORMAT_ID
  readonly displayName = 'JSON'
  readonly formatBadge = '{}'

  render(
    content: ContentBlock,
    config: RendererConfig
  ): Either.Either<RenderedContent, RenderError> {
    return Either.try({
      try: () => JSON.parse(fullText(content)),
      catch: (error) =>
        new RenderFailedError({
          formatId: JSON_FORMAT_ID,
          reason: `Invalid JSON: ${error instanceof Error ? error.message : String(error)}`,
        }),
    }).pipe(
      Either.map((value): RenderedContent => {
        const lines: StyledLine[] = []
        renderValue(value, 0, [], '', config.themeColors, lines)
        return {
          lines,
          formatBadge: this.formatBadge,
          lineMapping: lines.map((_, i) => ({ renderedLine: i, sourceLine: null })),
        }
      })
    )
  }
}
