// Address-keyed collections. JS Map and Set key objects by identity; these key
// by the 48-bit value so an equal but distinct MacAddress finds the same entry.

import { MacAddress } from "./mac-address";

export class MacAddressMap<V> {
  private readonly byValue = new Map<number, [MacAddress, V]>();

  constructor(entries?: Iterable<readonly [MacAddress, V]>) {
    if (entries) {
      for (const [k, v] of entries) this.set(k, v);
    }
  }

  get size(): number {
    return this.byValue.size;
  }

  get(key: MacAddress): V | undefined {
    return this.byValue.get(key.toNumber())?.[1];
  }

  has(key: MacAddress): boolean {
    return this.byValue.has(key.toNumber());
  }

  /** Keeps the first key instance stored for an address; only the value is replaced. */
  set(key: MacAddress, value: V): this {
    const n = key.toNumber();
    const cur = this.byValue.get(n);
    this.byValue.set(n, [cur ? cur[0] : key, value]);
    return this;
  }

  delete(key: MacAddress): boolean {
    return this.byValue.delete(key.toNumber());
  }

  clear(): void {
    this.byValue.clear();
  }

  *keys(): IterableIterator<MacAddress> {
    for (const [k] of this.byValue.values()) yield k;
  }

  *values(): IterableIterator<V> {
    for (const [, v] of this.byValue.values()) yield v;
  }

  *entries(): IterableIterator<[MacAddress, V]> {
    for (const [k, v] of this.byValue.values()) yield [k, v];
  }

  [Symbol.iterator](): IterableIterator<[MacAddress, V]> {
    return this.entries();
  }

  /** Entries in address order. */
  sorted(): [MacAddress, V][] {
    return [...this.entries()].sort((a, b) => MacAddress.compare(a[0], b[0]));
  }
}

export class MacAddressSet {
  private readonly items = new MacAddressMap<true>();

  constructor(values?: Iterable<MacAddress>) {
    if (values) {
      for (const v of values) this.add(v);
    }
  }

  get size(): number {
    return this.items.size;
  }

  add(value: MacAddress): this {
    this.items.set(value, true);
    return this;
  }

  has(value: MacAddress): boolean {
    return this.items.has(value);
  }

  delete(value: MacAddress): boolean {
    return this.items.delete(value);
  }

  clear(): void {
    this.items.clear();
  }

  values(): IterableIterator<MacAddress> {
    return this.items.keys();
  }

  [Symbol.iterator](): IterableIterator<MacAddress> {
    return this.values();
  }

  /** Members in address order. */
  sorted(): MacAddress[] {
    return [...this.values()].sort(MacAddress.compare);
  }
}
