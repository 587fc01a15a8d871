import fs from 'fs/promises'
import os from 'os'
import path from 'path'
import { PDFDocument, StandardFonts } from 'pdf-lib'
import sharp from 'sharp'

export async function makeTempDir(prefix: string): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), `${prefix}-`))
}

export async function removeTempDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true })
}

export interface ImageFixtureOptions {
  width: number
  height: number
  format?: 'jpeg' | 'png'
  /** EXIF orientation tag to write into the file */
  orientation?: number
  /** Half-transparent pixels (PNG only) */
  transparent?: boolean
}

/**
 * Write a solid-colour image and return its path.
 */
export async function writeImage(dir: string, name: string, options: ImageFixtureOptions): Promise<string> {
  const filePath = path.join(dir, name)
  let image = sharp({
    create: {
      width: options.width,
      height: options.height,
      channels: options.transparent ? 4 : 3,
      background: { r: 40, g: 120, b: 200, alpha: options.transparent ? 0.5 : 1 },
    },
  })
  image = options.format === 'png' ? image.png() : image.jpeg()
  if (options.orientation !== undefined) {
    image = image.withMetadata({ orientation: options.orientation })
  }
  await image.toFile(filePath)
  return filePath
}

/**
 * Write a PDF with one page per entry of `pageSizes`, each carrying `text`.
 */
export async function writePdf(
  dir: string,
  name: string,
  pageSizes: Array<[number, number]>,
  text = 'Original content',
): Promise<string> {
  const doc = await PDFDocument.create()
  const font = await doc.embedFont(StandardFonts.Helvetica)
  for (const size of pageSizes) {
    const page = doc.addPage(size)
    page.drawText(text, { x: 50, y: 50, size: 14, font })
  }
  const filePath = path.join(dir, name)
  await fs.writeFile(filePath, await doc.save())
  return filePath
}

export async function listFiles(dir: string): Promise<string[]> {
  return (await fs.readdir(dir)).sort()
}
