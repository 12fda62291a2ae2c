import type { RelevanceFilterKind } from "../config/settings.js";

export type RelevanceVerdict = {
  isRelevant: boolean;
  /** In [0, 1]. */
  confidence: number;
};

/**
 * Second-stage check that a chunk answers the question, as opposed to merely
 * resembling it. Runs after the similarity threshold, before generation.
 */
export interface RelevanceFilter {
  readonly name: string;
  check(chunkText: string, question: string): Promise<RelevanceVerdict>;
}

/** Passes every chunk. No model-backed filter exists yet. */
export class NullRelevanceFilter implements RelevanceFilter {
  readonly name = "none";

  async check(_chunkText: string, _question: string): Promise<RelevanceVerdict> {
    return { isRelevant: true, confidence: 1.0 };
  }
}

export function createRelevanceFilter(kind: RelevanceFilterKind): RelevanceFilter {
  switch (kind) {
    case "none":
      return new NullRelevanceFilter();
  }
}
