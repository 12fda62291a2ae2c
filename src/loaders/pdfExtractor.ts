import { PDFLoader } from "@langchain/community/document_loaders/fs/pdf";

import { UnreadableSourceError } from "../errors.js";
import { documentsToPages } from "./documents.js";
import type { ExtractedPage, PdfInput, TextExtractor } from "./types.js";

export class PdfExtractor implements TextExtractor<PdfInput> {
  async extract(input: PdfInput): Promise<ExtractedPage[]> {
    const loader = new PDFLoader(new Blob([input.data], { type: "application/pdf" }), {
      splitPages: true
    });

    try {
      return documentsToPages(await loader.load());
    } catch (err: unknown) {
      throw new UnreadableSourceError(`Could not read PDF: ${input.fileName}`, { cause: err });
    }
  }
}
