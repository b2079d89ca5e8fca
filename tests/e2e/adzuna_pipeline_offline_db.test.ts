/**
 * E2E Test: Adzuna Pipeline (Offline - Mock HTTP + Real DB)
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { runAdzunaPipeline } from "@/ingestion";
import { countListings, getListingByKey, tableExists } from "@/db";
import { ADZUNA_TABLE } from "@/constants";
import { computeListingKey } from "@/utils";
import type { Settings } from "@/types";
import { createMockHttp } from "../helpers/mockHttp";
import { createTestDb, type TestDbHarness } from "../helpers/testDb";
import searchResponse from "../fixtures/adzuna/search.json";

const ADZUNA_URL = "http://api.adzuna.com/v1/api/jobs/in/search/1";

describe("E2E: Adzuna Pipeline (Offline - Mock HTTP + Real DB)", () => {
  let dbHarness: TestDbHarness;
  let settings: Settings;
  const mockHttp = createMockHttp();

  beforeEach(() => {
    dbHarness = createTestDb();
    settings = {
      ...dbHarness.settings,
      adzuna: { appId: "test-app-id", appKey: "test-secret" },
    };
    mockHttp.reset();
  });

  afterEach(() => {
    dbHarness.cleanup();
  });

  it("should load the search results into AdzunaJobs", async () => {
    mockHttp.on("GET", ADZUNA_URL, searchResponse);

    const result = await runAdzunaPipeline({ settings, httpRequest: mockHttp.request });

    expect(result).toEqual({
      provider: "adzuna",
      status: "success",
      stage: "upsert",
      fetched: 2,
      upserted: 2,
    });

    const db = dbHarness.open();
    expect(countListings(db, ADZUNA_TABLE)).toBe(2);

    const key = computeListingKey("Initech", "Data Engineer", "India, Karnataka, Bangalore");
    expect(getListingByKey(db, ADZUNA_TABLE, key)).toEqual({
      unique_job_id: key,
      api_id: "4001",
      date_posted: "2024-04-30T08:15:00.000Z",
      company: "Initech",
      position: "Data Engineer",
      location: "India, Karnataka, Bangalore",
      category: "IT Jobs",
      salary_min: 850000,
      salary_max: 1200001,
      redirect_url: "https://adzuna.example/details/4001",
    });
  });

  it("should key a listing without location on the empty string", async () => {
    mockHttp.on("GET", ADZUNA_URL, searchResponse);

    await runAdzunaPipeline({ settings, httpRequest: mockHttp.request });

    const row = getListingByKey(
      dbHarness.open(),
      ADZUNA_TABLE,
      computeListingKey("Umbrella Labs", "AI Researcher", null),
    );
    expect(row?.location).toBe(null);
    expect(row?.category).toBe(null);
    expect(row?.salary_min).toBe(0);
    expect(row?.date_posted).toBe(null);
  });

  it("should fail at load_config without the [adzuna] section", async () => {
    const result = await runAdzunaPipeline({
      settings: dbHarness.settings,
      httpRequest: mockHttp.request,
    });

    expect(result).toEqual({
      provider: "adzuna",
      status: "failed",
      stage: "load_config",
      fetched: 0,
      upserted: 0,
      error: "Config error: [adzuna] app_id and app_key are required (test)",
    });
    expect(mockHttp.getRecordedRequests()).toHaveLength(0);
  });

  it("should skip when the API rejects the credentials", async () => {
    mockHttp.onResponse("GET", ADZUNA_URL, {
      status: 401,
      body: { exception: "AUTH_FAIL" },
    });

    const result = await runAdzunaPipeline({ settings, httpRequest: mockHttp.request });

    expect(result.status).toBe("skipped");
    expect(result.stage).toBe("normalize");
    expect(tableExists(dbHarness.open(), "AdzunaJobs")).toBe(false);
  });
});
