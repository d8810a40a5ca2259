// core/pdf/extract.ts
import { getDocument, VerbosityLevel } from "pdfjs-dist/legacy/build/pdf.mjs"
import { ExtractionError } from "../domain/errors.js"

type PDFDocumentProxy = Awaited<ReturnType<typeof getDocument>["promise"]>

export const PAGE_SEPARATOR = "\n\n"

/**
 * Extract the text layer of a PDF, pages in order, separated by one blank line.
 * Image-only PDFs have no text layer and fail with NO_TEXT.
 */
export async function extractText(bytes: Uint8Array): Promise<string> {
  // pdf.js takes ownership of (and detaches) the buffer it is given.
  const data = new Uint8Array(bytes)

  const task = getDocument({
    data,
    disableFontFace: true,
    isEvalSupported: false,
    useSystemFonts: false,
    verbosity: VerbosityLevel.ERRORS,
  })

  let doc: PDFDocumentProxy
  try {
    doc = await task.promise
  } catch (e) {
    await task.destroy()
    throw new ExtractionError("UNREADABLE", { detail: describe(e), cause: e })
  }

  try {
    const pages: string[] = []
    for (let n = 1; n <= doc.numPages; n++) {
      const pageText = await readPage(doc, n)
      if (pageText) pages.push(pageText)
    }

    const text = pages.join(PAGE_SEPARATOR)
    if (!text.trim()) throw new ExtractionError("NO_TEXT", { detail: `no text layer in ${doc.numPages} page(s)` })
    return text
  } finally {
    await doc.destroy()
  }
}

async function readPage(doc: PDFDocumentProxy, pageNumber: number): Promise<string> {
  try {
    const page = await doc.getPage(pageNumber)
    const content = await page.getTextContent()
    let out = ""
    for (const item of content.items) {
      if (!("str" in item)) continue // marked-content markers
      out += item.str
      if (item.hasEOL) out += "\n"
    }
    page.cleanup()
    return out.trim()
  } catch (e) {
    throw new ExtractionError("UNREADABLE", { detail: `page ${pageNumber}: ${describe(e)}`, cause: e })
  }
}

function describe(e: unknown): string {
  if (e instanceof Error) return `${e.name}: ${e.message}`
  return String(e)
}
