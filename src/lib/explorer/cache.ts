import type { Element } from "../api/types.js";

export type ElementFetcher = (id: string) => Promise<Element>;

/**
 * Element id -> last fetched element JSON.
 *
 * No eviction and no TTL: a cache lives exactly as long as the Session that
 * owns it. Concurrent getOrFetch calls for the same uncached id share one
 * request; a failed request is not remembered.
 */
export class ElementCache {
  private readonly elements = new Map<string, Element>();
  private readonly inFlight = new Map<string, Promise<Element>>();
  private generation = 0;

  constructor(private readonly fetcher: ElementFetcher) {}

  get(id: string): Element | undefined {
    return this.elements.get(id);
  }

  has(id: string): boolean {
    return this.elements.has(id);
  }

  /** Store an element under its own id, overwriting any earlier payload. */
  set(element: Element): void {
    this.elements.set(element["@id"], element);
  }

  get size(): number {
    return this.elements.size;
  }

  values(): IterableIterator<Element> {
    return this.elements.values();
  }

  entries(): IterableIterator<[string, Element]> {
    return this.elements.entries();
  }

  toRecord(): Record<string, Element> {
    return Object.fromEntries(this.elements);
  }

  async getOrFetch(id: string): Promise<Element> {
    const cached = this.elements.get(id);
    if (cached) return cached;

    const pending = this.inFlight.get(id);
    if (pending) return pending;

    const generation = this.generation;
    const request = this.fetcher(id).then(
      (element) => {
        // a clear() while the request was out must not resurrect the entry
        if (generation === this.generation) {
          this.elements.set(id, element);
          this.inFlight.delete(id);
        }
        return element;
      },
      (error: unknown) => {
        if (generation === this.generation) this.inFlight.delete(id);
        throw error;
      }
    );
    this.inFlight.set(id, request);
    return request;
  }

  clear(): void {
    this.elements.clear();
    this.inFlight.clear();
    this.generation++;
  }
}
