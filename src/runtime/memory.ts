import { PAGE_SIZE } from "../binary/module.js";

/**
 * Linear memory whose backing region is allocated on first access. Until
 * then only the page count is tracked, so an instance that never touches
 * memory never allocates it.
 */
export class LinearMemory {
  private region: Uint8Array | null = null;
  private dataView: DataView | null = null;
  private currentPages: number;

  constructor(
    initialPages: number,
    readonly maxPages: number,
    private readonly initialize: (bytes: Uint8Array) => void = () => {},
  ) {
    this.currentPages = initialPages;
  }

  get pages(): number {
    return this.currentPages;
  }

  get size(): number {
    return this.currentPages * PAGE_SIZE;
  }

  get materialized(): boolean {
    return this.region !== null;
  }

  inBounds(address: number, width: number): boolean {
    return address + width <= this.size;
  }

  bytes(): Uint8Array {
    if (!this.region) {
      this.region = new Uint8Array(this.size);
      this.dataView = null;
      this.initialize(this.region);
    }
    return this.region;
  }

  view(): DataView {
    if (!this.dataView) {
      const bytes = this.bytes();
      this.dataView = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    }
    return this.dataView;
  }

  /** Returns the previous page count, or -1 when the memory cannot grow. */
  grow(deltaPages: number): number {
    const previous = this.currentPages;
    const next = previous + deltaPages;
    if (next > this.maxPages) return -1;
    if (this.region) {
      const grown = new Uint8Array(next * PAGE_SIZE);
      grown.set(this.region);
      this.region = grown;
      this.dataView = null;
    }
    this.currentPages = next;
    return previous;
  }
}
