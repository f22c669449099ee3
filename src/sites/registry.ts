import type { SiteAdapter, SiteDescriptor } from './adapter.js';
import { SiteError } from '../shared/errors.js';

export type SiteFactory = () => SiteAdapter;

interface RegisteredSite {
  descriptor: SiteDescriptor;
  factory: SiteFactory;
}

/**
 * Runtime map from site id to a descriptor and an adapter factory.
 */
export class SiteRegistry {
  private readonly sites = new Map<string, RegisteredSite>();

  register(descriptor: SiteDescriptor, factory: SiteFactory): void {
    if (this.sites.has(descriptor.id)) {
      throw new SiteError(`Site already registered: ${descriptor.id}`, { site: descriptor.id });
    }
    this.sites.set(descriptor.id, { descriptor, factory });
  }

  has(id: string): boolean {
    return this.sites.has(id);
  }

  get(id: string): SiteDescriptor | undefined {
    return this.sites.get(id)?.descriptor;
  }

  create(id: string): SiteAdapter {
    const site = this.sites.get(id);
    if (!site) {
      throw new SiteError(`Unknown site: ${id}. Available: ${this.ids().join(', ') || '(none)'}`, {
        site: id,
      });
    }
    return site.factory();
  }

  ids(): string[] {
    return [...this.sites.keys()];
  }

  list(): SiteDescriptor[] {
    return [...this.sites.values()].map((s) => s.descriptor);
  }
}
