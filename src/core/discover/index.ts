export { DiscoveryService } from './service.js';
export { BaseDiscoveryAdapter, encodeKeyword } from './base.js';
export { SprzedajemyDiscovery } from './sprzedajemy.js';
export { GratkaDiscovery } from './gratka.js';
export type { DiscoveryAdapter, ListingSearch } from './types.js';
