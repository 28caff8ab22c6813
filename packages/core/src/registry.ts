import { ChangeDetector } from './detector';
import type { ChangeSource, Tenant } from './types';

/**
 * Detectors keyed by tenant. Entries are added on first access and stay
 * until `clear()` at shutdown.
 */
export class DetectorRegistry {
  private readonly detectors = new Map<Tenant, ChangeDetector>();

  /** Return the tenant's detector, creating it from `source()` the first time. */
  ensure(tenant: Tenant, source: () => ChangeSource): ChangeDetector {
    let detector = this.detectors.get(tenant);
    if (!detector) {
      detector = new ChangeDetector(source());
      this.detectors.set(tenant, detector);
    }
    return detector;
  }

  get(tenant: Tenant): ChangeDetector | undefined {
    return this.detectors.get(tenant);
  }

  has(tenant: Tenant): boolean {
    return this.detectors.has(tenant);
  }

  get size(): number {
    return this.detectors.size;
  }

  /** Snapshot of the current entries; safe to iterate while new tenants register. */
  entries(): Array<[Tenant, ChangeDetector]> {
    return Array.from(this.detectors.entries());
  }

  clear(): void {
    this.detectors.clear();
  }
}
