import type { ListingStub } from '../types/index.js';
import type { Notifier } from './types.js';
import { formatAlert } from './format.js';

/** Prints alerts to stdout. */
export class ConsoleNotifier implements Notifier {
  constructor(private readonly write: (text: string) => void = text => console.log(text)) {}

  async notify(destination: string, listings: ListingStub[], accepted: number): Promise<void> {
    this.write(`[Notify] -> ${destination}\n${formatAlert(listings, accepted)}`);
  }
}
