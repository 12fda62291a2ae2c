export type ExtractedPage = {
  text: string;
  /** 1-based; null when the source has no pages. */
  pageNumber: number | null;
};

export interface TextExtractor<TInput> {
  extract(input: TInput): Promise<ExtractedPage[]>;
}

export type PdfInput = { fileName: string; data: Uint8Array };
export type UrlInput = { url: string };
export type TextFileInput = { filePath: string };
