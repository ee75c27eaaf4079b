/**
 * Tests for ResultCache.
 */

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ResultCache } from "../cache.js";

describe("ResultCache", () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2026-01-01T00:00:00Z"));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("returns stored values until they expire", () => {
    const cache = new ResultCache<number>(1000);
    cache.set("a", 1);

    vi.advanceTimersByTime(1000);
    expect(cache.get("a")).toBe(1);

    vi.advanceTimersByTime(1);
    expect(cache.get("a")).toBeUndefined();
    expect(cache.size).toBe(0);
  });

  it("accepts a per-entry TTL", () => {
    const cache = new ResultCache<string>(1000);
    cache.set("short", "x", 10);

    vi.advanceTimersByTime(11);

    expect(cache.get("short")).toBeUndefined();
  });

  it("deletes and clears entries", () => {
    const cache = new ResultCache<number>();
    cache.set("a", 1);
    cache.set("b", 2);

    expect(cache.delete("a")).toBe(true);
    expect(cache.delete("a")).toBe(false);
    expect(cache.size).toBe(1);

    cache.clear();
    expect(cache.get("b")).toBeUndefined();
    expect(cache.size).toBe(0);
  });

  it("keeps separate caches independent", () => {
    const first = new ResultCache<number>();
    const second = new ResultCache<number>();
    first.set("a", 1);

    expect(second.get("a")).toBeUndefined();
  });
});
