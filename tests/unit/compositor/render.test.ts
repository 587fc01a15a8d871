import { describe, expect, it } from 'vitest'
import { PDFDocument } from 'pdf-lib'

import { bodyMeasure, embedOverlayFont, renderPagePlan, toEncodableText } from '../../../src/lib/compositor/render'

describe('render', () => {
  it('should keep WinAnsi characters and line breaks', async () => {
    const doc = await PDFDocument.create()
    const font = await embedOverlayFont(doc)

    expect(toEncodableText('Café\nNaïve', font)).toBe('Café\nNaïve')
  })

  it('should replace characters Helvetica cannot encode', async () => {
    const doc = await PDFDocument.create()
    const font = await embedOverlayFont(doc)

    expect(toEncodableText('Done ✓', font)).toBe('Done ?')
  })

  it('should turn tabs and other whitespace into spaces', async () => {
    const doc = await PDFDocument.create()
    const font = await embedOverlayFont(doc)

    expect(toEncodableText('Maple\tStreet\fNorth\nEast', font)).toBe('Maple Street North\nEast')
  })

  it('should measure at the body size', async () => {
    const doc = await PDFDocument.create()
    const font = await embedOverlayFont(doc)

    expect(bodyMeasure(font)('Maple')).toBe(font.widthOfTextAtSize('Maple', 12))
  })

  it('should refuse an image operation without an embedded image', async () => {
    const doc = await PDFDocument.create()
    const font = await embedOverlayFont(doc)
    const page = doc.addPage([612, 792])

    expect(() =>
      renderPagePlan(page, { width: 612, height: 792, ops: [{ kind: 'image', x: 0, y: 0, width: 10, height: 10 }] }, {
        font,
      })
    ).toThrow('Page plan draws an image but no image was embedded')
  })
})
