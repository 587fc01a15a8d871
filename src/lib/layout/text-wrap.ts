/**
 * Greedy word wrapping against a measured text width.
 */

/** Rendered width of a string in points, at a fixed font and size. */
export type TextMeasure = (text: string) => number

/**
 * One entry of wrapped output: a line to draw, or the short vertical gap
 * that stands in for a blank source line.
 */
export type WrappedLine =
  | { readonly kind: 'text'; readonly text: string }
  | { readonly kind: 'gap' }

const LINE_BREAK = /\r\n|\r|\n/
const WHITESPACE = /\s+/

/**
 * Wrap `text` so that every line measures at most `maxWidth`.
 *
 * Explicit line breaks start new paragraphs, and an empty paragraph becomes
 * a gap. A single word wider than `maxWidth` is emitted on a line of its own
 * rather than split.
 *
 * @example
 * ```typescript
 * wrapText('A\n\nB', 592, measure)
 * // [{ kind: 'text', text: 'A' }, { kind: 'gap' }, { kind: 'text', text: 'B' }]
 * ```
 */
export function wrapText(text: string, maxWidth: number, measure: TextMeasure): WrappedLine[] {
  const lines: WrappedLine[] = []

  for (const rawParagraph of text.split(LINE_BREAK)) {
    const paragraph = rawParagraph.trim()
    if (!paragraph) {
      lines.push({ kind: 'gap' })
      continue
    }

    let current = ''
    for (const word of paragraph.split(WHITESPACE)) {
      const candidate = current ? `${current} ${word}` : word

      if (measure(candidate) <= maxWidth) {
        current = candidate
      } else {
        if (current) {
          lines.push({ kind: 'text', text: current })
        }
        current = word
      }
    }

    if (current) {
      lines.push({ kind: 'text', text: current })
    }
  }

  return lines
}
