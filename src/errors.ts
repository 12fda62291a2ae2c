export type RagErrorKind =
  | "UnreadableSource"
  | "EmbeddingProviderError"
  | "GenerationError"
  | "SummarizationError"
  | "InvalidArgument"
  | "SessionNotFound"
  | "NoRelevantChunks";

export class RagError extends Error {
  readonly kind: RagErrorKind;

  constructor(kind: RagErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = kind;
    this.kind = kind;
  }
}

export class UnreadableSourceError extends RagError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("UnreadableSource", message, options);
  }
}

export class EmbeddingProviderError extends RagError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("EmbeddingProviderError", message, options);
  }
}

export class GenerationError extends RagError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("GenerationError", message, options);
  }
}

export class SummarizationError extends RagError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("SummarizationError", message, options);
  }
}

export class InvalidArgumentError extends RagError {
  constructor(message: string) {
    super("InvalidArgument", message);
  }
}

export class SessionNotFoundError extends RagError {
  readonly sessionId: string;

  constructor(sessionId: string) {
    super("SessionNotFound", `Session not found: ${sessionId}`);
    this.sessionId = sessionId;
  }
}

export class NoRelevantChunksError extends RagError {
  constructor(message: string) {
    super("NoRelevantChunks", message);
  }
}

export function isRagError(err: unknown): err is RagError {
  return err instanceof RagError;
}

/**
 * What a caller may show to a user. Only the kind and our own message survive;
 * provider errors stay on `cause`.
 */
export function toErrorPayload(err: unknown): { kind: RagErrorKind | "InternalError"; message: string } {
  if (isRagError(err)) {
    return { kind: err.kind, message: err.message };
  }
  return { kind: "InternalError", message: "Unexpected error" };
}
