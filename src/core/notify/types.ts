import type { ListingStub } from '../types/index.js';

export interface Notifier {
  /**
   * Delivers one alert. `accepted` is the number of new listings found in the
   * scan, which may exceed `listings.length`.
   */
  notify(destination: string, listings: ListingStub[], accepted: number): Promise<void>;
}
