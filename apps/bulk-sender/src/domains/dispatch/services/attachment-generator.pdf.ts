import type { TimeSource } from "@bulkmail/clock"
import {
  type PDFFont,
  type PDFImage,
  type PDFPage,
  PDFDocument,
  rgb,
  StandardFonts,
} from "pdf-lib"
import type { AttachmentGenerator } from "../model/attachment.model"
import { DispatchError } from "../model/dispatch.errors"
import type { RecipientRecord } from "../model/recipient.model"

export type ImageFormat = "png" | "jpeg"

export type PdfLogo = {
  bytes: Uint8Array
  format: ImageFormat
}

export type PdfAttachmentGeneratorDeps = {
  clock: TimeSource
}

export type PdfAttachmentGeneratorOptions = {
  logo?: PdfLogo
}

const PAGE = { width: 612, height: 792 } as const
const MARGIN = 72
const CONTENT_WIDTH = PAGE.width - 2 * MARGIN
const LOGO_MAX = { width: 150, height: 60 } as const

const TABLE = { labelWidth: 144, valueWidth: 288, rowHeight: 28, padding: 8, fontSize: 11 } as const
const BODY = { fontSize: 11, lineHeight: 15 } as const
const FOOTER = { fontSize: 9, lineHeight: 12 } as const

const colors = {
  ink: rgb(0.17, 0.24, 0.31),
  muted: rgb(0.5, 0.55, 0.55),
  labelFill: rgb(0.93, 0.94, 0.95),
  grid: rgb(0.74, 0.76, 0.78),
}

const PRODUCER = "bulkmail"

export function detectImageFormat(bytes: Uint8Array): ImageFormat | null {
  if (bytes[0] === 0x89 && bytes[1] === 0x50 && bytes[2] === 0x4e && bytes[3] === 0x47) return "png"
  if (bytes[0] === 0xff && bytes[1] === 0xd8 && bytes[2] === 0xff) return "jpeg"

  return null
}

function splitLongWord(word: string, font: PDFFont, size: number, maxWidth: number): string[] {
  const pieces: string[] = []
  let current = ""

  for (const char of word) {
    if (current && font.widthOfTextAtSize(current + char, size) > maxWidth) {
      pieces.push(current)
      current = char
    } else {
      current += char
    }
  }

  if (current) pieces.push(current)
  return pieces
}

/** Greedy word wrap; explicit line breaks are kept and over-long words are split. */
export function wrapText(text: string, font: PDFFont, size: number, maxWidth: number): string[] {
  const lines: string[] = []

  for (const paragraph of text.split(/\r?\n/)) {
    let line = ""

    for (const word of paragraph.split(/\s+/).filter(Boolean)) {
      const candidate = line ? `${line} ${word}` : word
      if (font.widthOfTextAtSize(candidate, size) <= maxWidth) {
        line = candidate
        continue
      }

      if (line) lines.push(line)

      const pieces = splitLongWord(word, font, size, maxWidth)
      line = pieces.pop() ?? ""
      lines.push(...pieces)
    }

    lines.push(line)
  }

  return lines
}

function fitWidth(text: string, font: PDFFont, size: number, maxWidth: number): string {
  if (font.widthOfTextAtSize(text, size) <= maxWidth) return text

  let truncated = text
  while (truncated && font.widthOfTextAtSize(`${truncated}...`, size) > maxWidth) {
    truncated = truncated.slice(0, -1)
  }
  return `${truncated}...`
}

type Fonts = { regular: PDFFont; bold: PDFFont }

/** Tracks the current page and the vertical write position. */
class Layout {
  private page: PDFPage
  y: number

  constructor(private readonly doc: PDFDocument) {
    this.page = doc.addPage([PAGE.width, PAGE.height])
    this.y = PAGE.height - MARGIN
  }

  get current(): PDFPage {
    return this.page
  }

  ensure(height: number): void {
    if (this.y - height >= MARGIN) return

    this.page = this.doc.addPage([PAGE.width, PAGE.height])
    this.y = PAGE.height - MARGIN
  }

  centered(text: string, font: PDFFont, size: number, color = colors.ink): void {
    const width = font.widthOfTextAtSize(text, size)
    this.page.drawText(text, { x: (PAGE.width - width) / 2, y: this.y - size, size, font, color })
    this.y -= size
  }
}

/**
 * One-page (or longer, for long messages) personalized PDF: optional logo,
 * title, a details table, the personal message and a footer.
 *
 * Text is set in the standard Helvetica fonts; characters outside their
 * encoding make generation fail with `attachment_failed`.
 */
export class PdfAttachmentGenerator implements AttachmentGenerator {
  readonly contentType = "application/pdf"

  constructor(
    private readonly deps: PdfAttachmentGeneratorDeps,
    private readonly opts: PdfAttachmentGeneratorOptions = {},
  ) {}

  async generate(recipient: RecipientRecord): Promise<Uint8Array> {
    try {
      return await this.render(recipient)
    } catch (cause) {
      throw DispatchError.attachmentFailed({ email: recipient.email, cause })
    }
  }

  private async render(recipient: RecipientRecord): Promise<Uint8Array> {
    const now = this.deps.clock.now()
    const title = recipient.attachmentName ?? "Personalized Document"

    const doc = await PDFDocument.create()
    doc.setTitle(title)
    doc.setProducer(PRODUCER)
    doc.setCreator(PRODUCER)
    doc.setCreationDate(now)
    doc.setModificationDate(now)

    const fonts: Fonts = {
      regular: await doc.embedFont(StandardFonts.Helvetica),
      bold: await doc.embedFont(StandardFonts.HelveticaBold),
    }

    const layout = new Layout(doc)

    if (this.opts.logo) {
      this.drawLogo(layout, await this.embedLogo(doc, this.opts.logo))
    }

    layout.centered(title, fonts.bold, 20)
    layout.y -= 30

    this.drawDetails(layout, fonts, [
      ["Name", recipient.name],
      ["Company", recipient.company ?? "N/A"],
      ["City", recipient.city ?? "N/A"],
      ["Date", now.toISOString().slice(0, 10)],
    ])
    layout.y -= 36

    if (recipient.customMessage) {
      this.drawMessage(layout, fonts, recipient.customMessage)
      layout.y -= 24
    }

    layout.ensure(2 * FOOTER.lineHeight + 12)
    layout.y -= 12
    layout.centered(
      `Generated on ${now.toISOString().slice(0, 16).replace("T", " ")} UTC`,
      fonts.regular,
      FOOTER.fontSize,
      colors.muted,
    )
    layout.y -= FOOTER.lineHeight - FOOTER.fontSize
    layout.centered(
      "Confidential document, intended solely for the recipient",
      fonts.regular,
      FOOTER.fontSize,
      colors.muted,
    )

    return doc.save()
  }

  private embedLogo(doc: PDFDocument, logo: PdfLogo): Promise<PDFImage> {
    return logo.format === "png" ? doc.embedPng(logo.bytes) : doc.embedJpg(logo.bytes)
  }

  private drawLogo(layout: Layout, image: PDFImage): void {
    const scale = Math.min(LOGO_MAX.width / image.width, LOGO_MAX.height / image.height, 1)
    const width = image.width * scale
    const height = image.height * scale

    layout.current.drawImage(image, {
      x: (PAGE.width - width) / 2,
      y: layout.y - height,
      width,
      height,
    })
    layout.y -= height + 20
  }

  private drawDetails(layout: Layout, fonts: Fonts, rows: ReadonlyArray<[string, string]>): void {
    const left = MARGIN + (CONTENT_WIDTH - TABLE.labelWidth - TABLE.valueWidth) / 2
    const textOffset = (TABLE.rowHeight - TABLE.fontSize) / 2 + 2

    layout.ensure(rows.length * TABLE.rowHeight)
    const page = layout.current

    for (const [label, value] of rows) {
      const bottom = layout.y - TABLE.rowHeight

      page.drawRectangle({
        x: left,
        y: bottom,
        width: TABLE.labelWidth,
        height: TABLE.rowHeight,
        color: colors.labelFill,
        borderColor: colors.grid,
        borderWidth: 1,
      })
      page.drawRectangle({
        x: left + TABLE.labelWidth,
        y: bottom,
        width: TABLE.valueWidth,
        height: TABLE.rowHeight,
        borderColor: colors.grid,
        borderWidth: 1,
      })

      const labelText = `${label}:`
      const labelWidth = fonts.bold.widthOfTextAtSize(labelText, TABLE.fontSize)
      page.drawText(labelText, {
        x: left + TABLE.labelWidth - TABLE.padding - labelWidth,
        y: bottom + textOffset,
        size: TABLE.fontSize,
        font: fonts.bold,
        color: colors.ink,
      })

      const valueText = fitWidth(value, fonts.regular, TABLE.fontSize, TABLE.valueWidth - 2 * TABLE.padding)
      page.drawText(valueText, {
        x: left + TABLE.labelWidth + TABLE.padding,
        y: bottom + textOffset,
        size: TABLE.fontSize,
        font: fonts.regular,
        color: colors.ink,
      })

      layout.y = bottom
    }
  }

  private drawMessage(layout: Layout, fonts: Fonts, message: string): void {
    layout.ensure(14 + 10 + BODY.lineHeight)
    layout.current.drawText("Personal Message", {
      x: MARGIN,
      y: layout.y - 14,
      size: 14,
      font: fonts.bold,
      color: colors.ink,
    })
    layout.y -= 14 + 10

    for (const line of wrapText(message, fonts.regular, BODY.fontSize, CONTENT_WIDTH)) {
      layout.ensure(BODY.lineHeight)
      layout.current.drawText(line, {
        x: MARGIN,
        y: layout.y - BODY.fontSize,
        size: BODY.fontSize,
        font: fonts.regular,
        color: colors.ink,
      })
      layout.y -= BODY.lineHeight
    }
  }
}
