/**
 * Unit tests for Jooble mappers
 */

import { describe, it, expect } from "vitest";
import { readFileSync } from "fs";
import { join } from "path";
import { mapJoobleJob } from "@/clients/jooble/mappers";
import type { JoobleJob, JoobleSearchResponse } from "@/types/clients/jooble";

function loadFixture<T>(filename: string): T {
  const fixturePath = join(__dirname, "../fixtures/jooble", filename);
  return JSON.parse(readFileSync(fixturePath, "utf-8"));
}

const jobs = loadFixture<JoobleSearchResponse>("search.json").jobs ?? [];

describe("mapJoobleJob", () => {
  it("should map a complete job", () => {
    expect(mapJoobleJob(jobs[0])).toEqual({
      providerId: "7781234",
      datePosted: "2024-05-02T00:00:00.000Z",
      company: "Hooli",
      position: "Python Developer",
      location: "Austin, TX",
      category: null,
      tags: "Build data pipelines in Python and SQL.",
      salaryMin: 50000,
      salaryMax: 50000,
      url: "https://jooble.example/desc/7781234",
    });
  });

  it("should turn empty strings into nulls and a blank salary into 0", () => {
    const record = mapJoobleJob(jobs[1]);

    expect(record.providerId).toBe("7781235");
    expect(record.company).toBe(null);
    expect(record.tags).toBe(null);
    expect(record.salaryMin).toBe(0);
    expect(record.salaryMax).toBe(0);
    expect(record.datePosted).toBe("2024-05-03T09:30:00.000Z");
  });

  it("should use the leading number for both ends of the range", () => {
    const raw: JoobleJob = { id: 1, salary: "from 45000 to 60000 USD" };
    const record = mapJoobleJob(raw);

    expect(record.salaryMin).toBe(45000);
    expect(record.salaryMax).toBe(45000);
  });

  it("should truncate and clamp to the 32-bit bound", () => {
    expect(mapJoobleJob({ salary: "$42.99 per hour" }).salaryMin).toBe(42);
    expect(mapJoobleJob({ salary: "9,999,999,999" }).salaryMax).toBe(2_147_483_647);
  });
});
