// pattern: Functional Core

import { describe, it, expect } from "vitest";
import { normalizeSearchRequest, resolveTimeWindow } from "./normalize.ts";
import { SEARCH_ARG_DEFAULTS } from "./types.ts";

describe("resolveTimeWindow", () => {
  it("should return undefined when no time field is set", () => {
    expect(resolveTimeWindow({})).toBeUndefined();
  });

  it("should turn a same-day date range into a one-day window", () => {
    expect(resolveTimeWindow({ start_date: "2025-03-14", end_date: "2025-03-14" })).toEqual({
      kind: "days",
      days: 1,
    });
  });

  it("should keep a real date range and drop days and time_range", () => {
    expect(
      resolveTimeWindow({ start_date: "2025-03-01", end_date: "2025-03-14", days: 3, time_range: "week" }),
    ).toEqual({ kind: "dates", start_date: "2025-03-01", end_date: "2025-03-14" });
  });

  it("should accept an open-ended date range", () => {
    expect(resolveTimeWindow({ start_date: "2025-03-01" })).toEqual({
      kind: "dates",
      start_date: "2025-03-01",
    });
  });

  it("should prefer days over time_range", () => {
    expect(resolveTimeWindow({ days: 3, time_range: "month" })).toEqual({ kind: "days", days: 3 });
  });

  it("should fall back to time_range", () => {
    expect(resolveTimeWindow({ time_range: "y" })).toEqual({ kind: "range", time_range: "y" });
  });
});

describe("normalizeSearchRequest", () => {
  it("should fill defaults and estimate the timeout", () => {
    const request = normalizeSearchRequest({ ...SEARCH_ARG_DEFAULTS, query: "tide tables" });

    expect(request).toEqual({
      query: "tide tables",
      search_depth: "basic",
      topic: "general",
      auto_parameters: false,
      max_results: 5,
      include_images: false,
      include_image_descriptions: false,
      include_answer: false,
      include_raw_content: false,
      include_domains: [],
      exclude_domains: [],
      include_favicon: false,
      timeout: 60,
    });
  });

  it("should keep an explicit timeout over the estimate", () => {
    const request = normalizeSearchRequest({
      ...SEARCH_ARG_DEFAULTS,
      query: "tide tables",
      search_depth: "advanced",
      timeout: 12,
    });

    expect(request.timeout).toBe(12);
  });

  it("should carry chunks_per_source, country and the resolved window only when set", () => {
    const request = normalizeSearchRequest({
      ...SEARCH_ARG_DEFAULTS,
      query: "tide tables",
      search_depth: "advanced",
      chunks_per_source: 2,
      country: "norway",
      start_date: "2025-01-01",
      end_date: "2025-01-01",
    });

    expect(request.chunks_per_source).toBe(2);
    expect(request.country).toBe("norway");
    expect(request.time_window).toEqual({ kind: "days", days: 1 });
    expect(request.timeout).toBe(90);
  });
});
