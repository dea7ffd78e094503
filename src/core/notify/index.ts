export { ConsoleNotifier } from './console.js';
export { formatAlert, formatListing, formatPrice } from './format.js';
export type { Notifier } from './types.js';
