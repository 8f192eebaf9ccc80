// Infrastructure: In-process coordination store
// TTL map for tests and single-worker runs; entries past their deadline read as absent

import type { ICoordinationStore } from '@/domain/coordination/types.js';
import { systemClock, type Clock } from '@/domain/shared/clock.js';

interface Entry {
  value: string;
  expiresAt: number;
}

export class MemoryCoordinationStore implements ICoordinationStore {
  private entries: Map<string, Entry> = new Map();

  constructor(private clock: Clock = systemClock) {}

  private live(key: string): Entry | null {
    const entry = this.entries.get(key);
    if (!entry) return null;
    if (entry.expiresAt <= this.clock.now()) {
      this.entries.delete(key);
      return null;
    }
    return entry;
  }

  async setIfAbsent(key: string, value: string, ttlMs: number): Promise<boolean> {
    if (this.live(key)) return false;
    this.entries.set(key, { value, expiresAt: this.clock.now() + ttlMs });
    return true;
  }

  async get(key: string): Promise<string | null> {
    return this.live(key)?.value ?? null;
  }

  async set(key: string, value: string, ttlMs: number): Promise<void> {
    this.entries.set(key, { value, expiresAt: this.clock.now() + ttlMs });
  }

  async remainingTtl(key: string): Promise<number | null> {
    const entry = this.live(key);
    return entry ? entry.expiresAt - this.clock.now() : null;
  }

  async deleteIfEquals(key: string, value: string): Promise<boolean> {
    const entry = this.live(key);
    if (!entry || entry.value !== value) return false;
    this.entries.delete(key);
    return true;
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(key);
  }

  async sweepExpired(): Promise<number> {
    const now = this.clock.now();
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  size(): number {
    return this.entries.size;
  }
}
