import { CheerioWebBaseLoader } from "@langchain/community/document_loaders/web/cheerio";

import { UnreadableSourceError } from "../errors.js";
import { documentsToPages } from "./documents.js";
import type { ExtractedPage, TextExtractor, UrlInput } from "./types.js";

export class WebPageExtractor implements TextExtractor<UrlInput> {
  constructor(private readonly timeoutMs = 15_000) {}

  async extract(input: UrlInput): Promise<ExtractedPage[]> {
    const loader = new CheerioWebBaseLoader(input.url, {
      selector: "body",
      timeout: this.timeoutMs
    });

    try {
      return documentsToPages(await loader.load());
    } catch (err: unknown) {
      throw new UnreadableSourceError(`Could not load web page: ${input.url}`, { cause: err });
    }
  }
}
