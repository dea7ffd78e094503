// src/core/extract/registry.ts
import type { Adapter } from './types.js';
import type { Platform } from '../types/index.js';
import { SprzedajemyAdapter } from './adapters/sprzedajemy.js';
import { GratkaAdapter } from './adapters/gratka.js';
import { OlxAdapter } from './adapters/olx.js';
import { AllegroAdapter } from './adapters/allegro.js';
import { VintedAdapter } from './adapters/vinted/index.js';
import { GenericAdapter } from './adapters/generic.js';

export class AdapterRegistry {
  private readonly fallback: Adapter = new GenericAdapter();

  private adapters: Adapter[] = [
    new SprzedajemyAdapter(),
    new GratkaAdapter(),
    new OlxAdapter(),
    new AllegroAdapter(),
    new VintedAdapter(),
  ];

  /** Never throws: URLs no platform claims go to the generic adapter. */
  select(url: string): Adapter {
    return this.adapters.find(a => a.canHandle(url)) ?? this.fallback;
  }

  register(adapter: Adapter): void {
    this.adapters.push(adapter);
  }

  detectPlatform(url: string): Platform {
    return this.select(url).platform;
  }
}

// Singleton instance
export const registry = new AdapterRegistry();

export function detectPlatform(url: string): Platform {
  return registry.detectPlatform(url);
}
