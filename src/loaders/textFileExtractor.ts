import { TextLoader } from "@langchain/classic/document_loaders/fs/text";

import { UnreadableSourceError } from "../errors.js";
import { documentsToPages } from "./documents.js";
import type { ExtractedPage, TextExtractor, TextFileInput } from "./types.js";

export class TextFileExtractor implements TextExtractor<TextFileInput> {
  async extract(input: TextFileInput): Promise<ExtractedPage[]> {
    const loader = new TextLoader(input.filePath);

    try {
      return documentsToPages(await loader.load());
    } catch (err: unknown) {
      throw new UnreadableSourceError(`Could not read file: ${input.filePath}`, { cause: err });
    }
  }
}
