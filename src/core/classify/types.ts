export interface Classifier {
  /** Returns the model's free-text answer. */
  complete(systemPrompt: string, userPrompt: string): Promise<string>;
}

export interface ValueRange {
  low: number;
  high: number;
}

export interface Margin {
  /** Percent gain at the low and high end of the estimate. */
  low: number;
  high: number;
}
