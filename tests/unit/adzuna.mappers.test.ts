/**
 * Unit tests for Adzuna mappers
 *
 * Adzuna payload → ListingRecord, no DB and no HTTP
 */

import { describe, it, expect } from "vitest";
import { readFileSync } from "fs";
import { join } from "path";
import { isAdzunaJob, mapAdzunaJob } from "@/clients/adzuna/mappers";
import type { AdzunaJob, AdzunaSearchResponse } from "@/types/clients/adzuna";

function loadFixture<T>(filename: string): T {
  const fixturePath = join(__dirname, "../fixtures/adzuna", filename);
  return JSON.parse(readFileSync(fixturePath, "utf-8"));
}

const searchResponse = loadFixture<AdzunaSearchResponse>("search.json");
const results = searchResponse.results ?? [];

describe("mapAdzunaJob", () => {
  it("should map a complete result", () => {
    expect(mapAdzunaJob(results[0])).toEqual({
      providerId: "4001",
      datePosted: "2024-04-30T08:15:00.000Z",
      company: "Initech",
      position: "Data Engineer",
      location: "India, Karnataka, Bangalore",
      category: "IT Jobs",
      tags: null,
      salaryMin: 850000,
      salaryMax: 1200001,
      url: "https://adzuna.example/details/4001",
    });
  });

  it("should degrade bad fields without dropping the record", () => {
    expect(mapAdzunaJob(results[1])).toEqual({
      providerId: "4002",
      datePosted: null,
      company: "Umbrella Labs",
      position: "AI Researcher",
      location: null,
      category: null,
      tags: null,
      salaryMin: 0,
      salaryMax: 0,
      url: "https://adzuna.example/details/4002",
    });
  });

  it("should accept numeric salary strings", () => {
    const raw: AdzunaJob = { id: "1", salary_min: "42000.5", salary_max: "abc" };
    const record = mapAdzunaJob(raw);

    expect(record.salaryMin).toBe(42000);
    expect(record.salaryMax).toBe(0);
  });

  it("should round exact halves to the even neighbour", () => {
    const record = mapAdzunaJob({ salary_min: 850000.5, salary_max: 2.5 });

    expect([record.salaryMin, record.salaryMax]).toEqual([850000, 2]);
  });

  it("should keep a bare string location", () => {
    const raw: AdzunaJob = { id: "1", location: "London" };
    expect(mapAdzunaJob(raw).location).toBe("London");
  });

  it("should map an empty result to nulls and zeros", () => {
    expect(mapAdzunaJob({})).toEqual({
      providerId: null,
      datePosted: null,
      company: null,
      position: null,
      location: null,
      category: null,
      tags: null,
      salaryMin: 0,
      salaryMax: 0,
      url: null,
    });
  });
});

describe("isAdzunaJob", () => {
  it("should accept objects and reject everything else", () => {
    expect(isAdzunaJob(results[0])).toBe(true);
    expect(isAdzunaJob("4001")).toBe(false);
    expect(isAdzunaJob(null)).toBe(false);
    expect(isAdzunaJob([results[0]])).toBe(false);
  });
});
