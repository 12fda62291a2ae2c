export function buildAnswerPrompt(params: { context: string; question: string }): string {
  return `Answer ONLY using the context below.
Add the source name after EACH sentence in [source] format, using the name shown in parentheses after the chunk number.
If the context does not contain the answer, say that the document does not cover it.

Context:
${params.context}

Question:
${params.question}`;
}

export function buildSummaryPrompt(params: { content: string; url: string }): string {
  return `Summarize the following web content in a clear and concise manner.
Focus on the main points, key information, and important details.
Include source citations in the format [Source: ${params.url}] at the end of each major point.

Content:
${params.content}

Provide a comprehensive summary with source citations:`;
}
