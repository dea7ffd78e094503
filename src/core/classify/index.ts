export { analyzeListing } from './analyze.js';
export { AnthropicClassifier, readMessageText } from './anthropic.js';
export { buildListingPrompt, buildSystemPrompt, DEFAULT_PROFILE } from './prompt.js';
export { computeMargin, parseValueRange, parseVerdict, VERDICT_EMOJI } from './verdict.js';
export type { PromptProfile } from './prompt.js';
export type { Classifier, Margin, ValueRange } from './types.js';
