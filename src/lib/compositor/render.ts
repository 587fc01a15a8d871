/**
 * Render a PagePlan onto a pdf-lib page.
 */

import { type PDFDocument, type PDFFont, type PDFImage, type PDFPage, rgb, StandardFonts } from 'pdf-lib'

import { FONT_SIZES } from '../layout/geometry'
import type { TextMeasure } from '../layout/text-wrap'
import type { PagePlan, RgbColor } from './types'

const REPLACEMENT_CHARACTER = '?'
const WHITESPACE = /\s/

export interface PageResources {
  font: PDFFont
  image?: PDFImage
}

/**
 * Embed the Helvetica standard font used for both body text and captions.
 */
export function embedOverlayFont(doc: PDFDocument): Promise<PDFFont> {
  return doc.embedFont(StandardFonts.Helvetica)
}

/**
 * Measure at the body font size with the given font.
 */
export function bodyMeasure(font: PDFFont): TextMeasure {
  return text => font.widthOfTextAtSize(text, FONT_SIZES.body)
}

/**
 * Replace characters the font cannot encode.
 *
 * Standard fonts only cover WinAnsi; anything else would make pdf-lib throw
 * while measuring or drawing. Line breaks are kept for wrapping, and other
 * whitespace (tabs, form feeds) becomes a plain space so it still separates
 * words.
 */
export function toEncodableText(text: string, font: PDFFont): string {
  let result = ''
  for (const char of text) {
    if (char === '\n' || char === '\r') {
      result += char
      continue
    }
    if (WHITESPACE.test(char)) {
      result += ' '
      continue
    }
    try {
      font.encodeText(char)
      result += char
    } catch {
      result += REPLACEMENT_CHARACTER
    }
  }
  return result
}

function toColor(color: RgbColor) {
  return rgb(color.r, color.g, color.b)
}

/**
 * Apply every operation of `plan` to `page`, in order.
 *
 * An image operation without an image resource is an error: the plan and
 * the resources were built for different pages.
 */
export function renderPagePlan(page: PDFPage, plan: PagePlan, resources: PageResources): void {
  for (const op of plan.ops) {
    switch (op.kind) {
      case 'rect':
        page.drawRectangle({
          x: op.x,
          y: op.y,
          width: op.width,
          height: op.height,
          color: toColor(op.color),
          borderWidth: 0,
        })
        break
      case 'text':
        page.drawText(op.text, {
          x: op.x,
          y: op.y,
          size: op.size,
          font: resources.font,
          color: toColor(op.color),
        })
        break
      case 'image':
        if (!resources.image) {
          throw new Error('Page plan draws an image but no image was embedded')
        }
        page.drawImage(resources.image, {
          x: op.x,
          y: op.y,
          width: op.width,
          height: op.height,
        })
        break
    }
  }
}
