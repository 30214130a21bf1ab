import { promises as fs } from "node:fs";
import * as pdfjsLib from "pdfjs-dist/legacy/build/pdf.mjs";
import type { ParseOptions } from "../../types/document.js";

export interface DocumentParser {
  readonly name: string;
  // One string per page
  parse(filePath: string, options: ParseOptions, signal?: AbortSignal): Promise<string[]>;
}

/**
 * Reads the text layer of a PDF. Scanned pages without a text layer come
 * back empty, which the engine treats as unreadable.
 */
export class PdfTextParser implements DocumentParser {
  readonly name = "pdfjs";

  async parse(filePath: string, options: ParseOptions, signal?: AbortSignal): Promise<string[]> {
    const data = new Uint8Array(await fs.readFile(filePath, { signal }));
    const loadingTask = pdfjsLib.getDocument({
      data,
      disableFontFace: true,
      useSystemFonts: true,
    });

    try {
      const pdf = await loadingTask.promise;
      const pages: string[] = [];

      for (let pageNum = 1; pageNum <= pdf.numPages; pageNum++) {
        signal?.throwIfAborted();
        const page = await pdf.getPage(pageNum);
        const content = await page.getTextContent();
        const lines: string[] = [];
        let current = "";

        for (const item of content.items) {
          if (!("str" in item)) continue;
          current += item.str;
          if (item.hasEOL) {
            lines.push(current);
            current = "";
          } else {
            current += " ";
          }
        }
        if (current.trim()) lines.push(current);

        pages.push(lines.map((line) => line.replace(/\u00A0/g, " ").trimEnd()).join("\n"));
      }

      console.log(
        `📄 [PARSE_COMPLETE] parser=${this.name} pages=${pages.length} language=${options.language}`
      );
      return pages;
    } finally {
      await loadingTask.destroy();
    }
  }
}
