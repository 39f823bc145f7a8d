import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { NextRequest } from "next/server";
import { GET } from "./route";
import { resetServerDataset } from "@/lib/server-dataset";

function request(query = "") {
  return new NextRequest(`http://localhost/api/dashboard${query}`);
}

describe("GET /api/dashboard", () => {
  beforeEach(() => {
    vi.stubEnv("TELEMETRY_PRESET", "smallServer");
    resetServerDataset();
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    resetServerDataset();
  });

  it("returns KPIs and charts for the default selection", async () => {
    const res = await GET(request());
    const body = await res.json();

    expect(res.status).toBe(200);
    expect(body.ok).toBe(true);
    expect(body.params.mode).toBe("Survival");
    expect(body.params.dayRange).toEqual([1, 90]);
    expect(body.kpis.mining_events).toBe(body.counts.mining);
    expect(body.kpis.deaths_count).toBe(body.counts.deaths);
    expect(body.counts.activity).toBeLessThanOrEqual(24 * 90);
    expect(body.charts.topPlayers.length).toBeLessThanOrEqual(15);
  });

  it("applies query filters", async () => {
    const res = await GET(request("?mode=Hardcore&dayLo=10&dayHi=20&biomes=&activeOnly=true"));
    const body = await res.json();

    expect(res.status).toBe(200);
    expect(body.params).toMatchObject({ mode: "Hardcore", dayRange: [10, 20], biomes: [], activeOnly: true });
    expect(body.counts.mining).toBe(0);
    expect(body.kpis.top_biome).toBe("—");
  });

  it("answers 400 with the failing field", async () => {
    const res = await GET(request("?dayLo=30&dayHi=5"));
    const body = await res.json();

    expect(res.status).toBe(400);
    expect(body.ok).toBe(false);
    expect(body.issues).toEqual(["dayRange: range start must not exceed range end"]);
  });

  it("answers 500 when the server environment is misconfigured", async () => {
    vi.stubEnv("TELEMETRY_SEED", "abc");
    const logged = vi.spyOn(console, "error").mockImplementation(() => undefined);

    const res = await GET(request("?mode=Survival"));
    const body = await res.json();

    expect(res.status).toBe(500);
    expect(body.ok).toBe(false);
    expect(body.issues).toBeUndefined();
    expect(body.error).toContain("TELEMETRY_SEED");
    expect(logged).toHaveBeenCalledTimes(1);
    logged.mockRestore();
  });
});
