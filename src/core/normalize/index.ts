export { parsePrice, findPriceInText } from './price.js';
export { normalizeCondition } from './condition.js';
export { truncateText, cleanText, collapseWhitespace } from './text.js';
