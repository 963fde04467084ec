import { MailProvider } from '../provider/MailProvider.js';
import { isReservedLabel } from './labelNames.js';
import { MailLabel } from '../types/index.js';

/**
 * Marker label name → provider label id.
 *
 * Passed into the processor rather than held globally so each run (and each
 * test) can own one. Concurrent chunks asking for the same missing label
 * share a single ensureLabel call.
 */
export class MarkerLabelCache {
  private readonly ids = new Map<string, string>();
  private readonly pending = new Map<string, Promise<string>>();

  /**
   * Bring the cache in line with a fresh mailbox listing: markers under
   * `prefix` that the listing lacks are dropped, the listed ones are stored
   * with their current ids.
   */
  reconcile(labels: readonly MailLabel[], prefix: string): void {
    const markers = labels.filter((label) => isReservedLabel(label.name, prefix));
    const listed = new Set(markers.map((label) => label.name));
    for (const name of Array.from(this.ids.keys())) {
      if (isReservedLabel(name, prefix) && !listed.has(name)) {
        this.ids.delete(name);
      }
    }
    for (const label of markers) {
      this.ids.set(label.name, label.id);
    }
  }

  has(name: string): boolean {
    return this.ids.has(name);
  }

  get(name: string): string | undefined {
    return this.ids.get(name);
  }

  resolve(name: string, provider: MailProvider): Promise<string> {
    const cached = this.ids.get(name);
    if (cached !== undefined) {
      return Promise.resolve(cached);
    }

    const inFlight = this.pending.get(name);
    if (inFlight) {
      return inFlight;
    }

    const request = provider
      .ensureLabel(name)
      .then((id) => {
        this.ids.set(name, id);
        return id;
      })
      .finally(() => {
        this.pending.delete(name);
      });
    this.pending.set(name, request);
    return request;
  }

  get size(): number {
    return this.ids.size;
  }
}
