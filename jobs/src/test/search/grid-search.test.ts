import { describe, it, expect, vi, beforeEach } from "vitest";

vi.mock("@trigger.dev/sdk", () => ({
  logger: {
    warn: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    log: vi.fn(),
    error: vi.fn(),
    trace: vi.fn((_name: string, fn: () => Promise<unknown>) => fn()),
  },
}));

import {
  ParcelQueryError,
  type PageRequest,
  type PropertyRecord,
  type QueryDescriptor,
} from "@parcel-radius/clients";
import {
  catastroSearch,
  gridRadiusSearch,
  municipioSearch,
} from "../../search/grid-search";
import { InvalidArgumentError } from "../../utils/errors";
import type { Clock, RateLimiter } from "../../utils/rate-limiter";
import type { Coordinate } from "../../utils/geo";

// ── Fake registry ─────────────────────────────────────────────────

const center = { lat: 18.4655, lon: -66.1057 };

function north(from: Coordinate, miles: number): Coordinate {
  return { lat: from.lat + ((miles * 1.60934) / 6371) * (180 / Math.PI), lon: from.lon };
}

function parcel(id: number, at: Coordinate, extra: PropertyRecord = {}): PropertyRecord {
  return { OBJECTID: id, CATASTRO: `000-000-000-${id}`, INSIDE_Y: at.lat, INSIDE_X: at.lon, ...extra };
}

/**
 * In-memory layer: a query returns every parcel whose interior point lies in
 * the polygon's bounding box, edges included, one page at a time.
 */
function fakeRegistry(parcels: PropertyRecord[]) {
  const queries: QueryDescriptor[] = [];

  const queryPage = vi.fn(async (descriptor: QueryDescriptor, page: PageRequest) => {
    queries.push(descriptor);
    const ring = descriptor.geometry?.rings[0] ?? [];
    const xs = ring.map(([x]) => x);
    const ys = ring.map(([, y]) => y);
    const hits = parcels.filter((p) => {
      if (ring.length === 0) return true;
      const x = Number(p.INSIDE_X);
      const y = Number(p.INSIDE_Y);
      return x >= Math.min(...xs) && x <= Math.max(...xs) && y >= Math.min(...ys) && y <= Math.max(...ys);
    });
    return hits.slice(page.offset, page.offset + page.limit);
  });

  const lookupParcel = vi.fn(
    async (catastro: string) => parcels.find((p) => p.CATASTRO === catastro) ?? null
  );

  return { queryPage, lookupParcel, queries };
}

function fakeClock() {
  const sleeps: number[] = [];
  const clock: Clock = {
    now: () => 0,
    sleep: async (ms) => {
      sleeps.push(ms);
    },
  };
  return { clock, sleeps };
}

function noWaitLimiter() {
  const waitForSlot = vi.fn(async () => {});
  const limiter: RateLimiter = {
    waitForSlot,
    schedule: async (fn) => fn(),
  };
  return { limiter, waitForSlot };
}

beforeEach(() => {
  vi.clearAllMocks();
});

// ── Tests ──────────────────────────────────────────────────────────

describe("gridRadiusSearch", () => {
  it("returns unique parcels inside the radius, nearest first", async () => {
    const registry = fakeRegistry([
      parcel(1, north(center, 0.5)),
      parcel(2, north(center, 2)),
      parcel(3, center),
      parcel(4, { lat: center.lat + 0.013, lon: center.lon + 0.013 }),
    ]);
    const { clock, sleeps } = fakeClock();

    const result = await gridRadiusSearch(
      registry,
      { center, radiusMiles: 1, gridSize: 2 },
      { clock, random: () => 0.5 }
    );

    expect(result.center).toEqual(center);
    expect(result.records.map((r) => r.OBJECTID)).toEqual([3, 1]);
    expect(result.records.map((r) => r.DISTANCE_MILES)).toEqual([0, 0.5]);
    expect(result.advisories).toEqual([]);
    expect(result.stats).toMatchObject({
      cells: 4,
      cellsFailed: 0,
      cellsAtCap: 0,
      unique: 3,
      withinRadius: 2,
      returned: 2,
    });
    expect(registry.queryPage).toHaveBeenCalledTimes(4);
    // jitter between cells only
    expect(sleeps).toEqual([1000, 1000, 1000]);
  });

  it("returns a record seen by several cells once", async () => {
    const queryPage = vi.fn(async () => [parcel(42, center)]);
    const { clock } = fakeClock();

    const result = await gridRadiusSearch(
      { queryPage, lookupParcel: vi.fn() },
      { center, radiusMiles: 1, gridSize: 2 },
      { clock }
    );

    expect(result.stats.fetched).toBe(4);
    expect(result.records.map((r) => r.OBJECTID)).toEqual([42]);
  });

  it("warns when a cell fills every allowed page", async () => {
    let nextId = 1;
    const queryPage = vi.fn(async () => [parcel(nextId++, center), parcel(nextId++, center)]);
    const { clock } = fakeClock();

    const result = await gridRadiusSearch(
      { queryPage, lookupParcel: vi.fn() },
      { center, radiusMiles: 1, gridSize: 2 },
      { clock, pageSize: 2, maxPages: 2, pageDelayMs: 10 }
    );

    const warnings = result.advisories.filter((a) => a.kind === "completeness_warning");
    expect(warnings).toHaveLength(4);
    expect(warnings[0]).toEqual({
      kind: "completeness_warning",
      cellIndex: 0,
      records: 4,
      cap: 4,
      suggestedGridSize: 4,
    });
    expect(result.stats.cellsAtCap).toBe(4);
    expect(result.records).toHaveLength(16);
  });

  it("records a failed cell and carries on", async () => {
    const queryPage = vi
      .fn<(d: QueryDescriptor, p: PageRequest) => Promise<PropertyRecord[]>>()
      .mockResolvedValueOnce([parcel(1, center)])
      .mockRejectedValueOnce(
        new ParcelQueryError("Parcel query error: Unable to complete operation.", {
          status: 500,
          backendMessage: "Unable to complete operation.",
        })
      )
      .mockResolvedValue([]);
    const { clock } = fakeClock();

    const result = await gridRadiusSearch(
      { queryPage, lookupParcel: vi.fn() },
      { center, radiusMiles: 1, gridSize: 2 },
      { clock }
    );

    expect(result.advisories).toEqual([
      {
        kind: "fetch_failure",
        cellIndex: 1,
        page: 0,
        status: 500,
        backendMessage: "Unable to complete operation.",
        message: "Parcel query error: Unable to complete operation.",
      },
    ]);
    expect(result.stats.cellsFailed).toBe(1);
    expect(queryPage).toHaveBeenCalledTimes(4);
    expect(result.records.map((r) => r.OBJECTID)).toEqual([1]);
  });

  it("keeps a cell's earlier pages when a later page fails unexpectedly", async () => {
    const queryPage = vi
      .fn<(d: QueryDescriptor, p: PageRequest) => Promise<PropertyRecord[]>>()
      .mockResolvedValueOnce([parcel(1, center), parcel(2, center)])
      .mockRejectedValueOnce(new TypeError("terminated"));
    const { clock } = fakeClock();

    const result = await gridRadiusSearch(
      { queryPage, lookupParcel: vi.fn() },
      { center, radiusMiles: 1, gridSize: 1 },
      { clock, pageSize: 2 }
    );

    expect(result.records.map((r) => r.OBJECTID)).toEqual([1, 2]);
    expect(result.advisories).toEqual([
      {
        kind: "fetch_failure",
        cellIndex: 0,
        page: 1,
        status: null,
        backendMessage: null,
        message: "terminated",
      },
    ]);
    expect(result.stats).toMatchObject({ cellsFailed: 1, fetched: 2 });
  });

  it("defaults to a 3x3 grid", async () => {
    const registry = fakeRegistry([]);
    const { clock } = fakeClock();

    const result = await gridRadiusSearch(registry, { center, radiusMiles: 1 }, { clock });

    expect(result.stats.cells).toBe(9);
    expect(registry.queryPage).toHaveBeenCalledTimes(9);
  });

  it("rejects invalid paging before any request", async () => {
    const registry = fakeRegistry([]);

    await expect(
      gridRadiusSearch(registry, { center, radiusMiles: 1, gridSize: 2 }, { maxPages: 0 })
    ).rejects.toMatchObject({ code: "INVALID_PAGING" });
    await expect(
      municipioSearch(registry, { municipio: "SAN JUAN" }, { pageSize: 0 })
    ).rejects.toMatchObject({ code: "INVALID_PAGING" });
    expect(registry.queryPage).not.toHaveBeenCalled();
  });

  it("resolves the center from a catastro number", async () => {
    const subject = { lat: 18.4, lon: -66.05 };
    const registry = fakeRegistry([parcel(9, subject), parcel(10, north(subject, 0.2))]);
    const { clock } = fakeClock();

    const result = await gridRadiusSearch(
      registry,
      { center: { catastro: "000-000-000-9" }, radiusMiles: 0.5, gridSize: 1 },
      { clock }
    );

    expect(registry.lookupParcel).toHaveBeenCalledWith("000-000-000-9");
    expect(result.center).toEqual(subject);
    expect(result.records.map((r) => r.OBJECTID)).toEqual([9, 10]);
  });

  it("returns an empty result when the catastro lookup finds nothing", async () => {
    const registry = fakeRegistry([]);

    const result = await gridRadiusSearch(registry, {
      center: { catastro: "999-999-999-99" },
      radiusMiles: 1,
      gridSize: 3,
    });

    expect(result.records).toEqual([]);
    expect(result.center).toBeNull();
    expect(result.advisories).toEqual([
      {
        kind: "lookup_failure",
        catastro: "999-999-999-99",
        message: "No parcel found for catastro 999-999-999-99",
      },
    ]);
    expect(registry.queryPage).not.toHaveBeenCalled();
  });

  it("returns an empty result when the catastro lookup fails", async () => {
    const lookupParcel = vi.fn(async () => {
      throw new ParcelQueryError("Parcel query request failed", {
        cause: new Error("getaddrinfo ENOTFOUND"),
      });
    });
    const queryPage = vi.fn(async () => []);

    const result = await gridRadiusSearch(
      { queryPage, lookupParcel },
      { center: { catastro: "1" }, radiusMiles: 1, gridSize: 3 }
    );

    expect(result.advisories).toEqual([
      {
        kind: "lookup_failure",
        catastro: "1",
        message: "Parcel query request failed → [Error] getaddrinfo ENOTFOUND",
      },
    ]);
    expect(queryPage).not.toHaveBeenCalled();
  });

  it("rejects bad input before any request", async () => {
    const registry = fakeRegistry([]);

    await expect(
      gridRadiusSearch(registry, { center, radiusMiles: 1, gridSize: 0 })
    ).rejects.toBeInstanceOf(InvalidArgumentError);
    await expect(
      gridRadiusSearch(registry, { center: { lat: -91, lon: 0 }, radiusMiles: 1, gridSize: 2 })
    ).rejects.toMatchObject({ code: "INVALID_CENTER" });
    await expect(
      gridRadiusSearch(registry, {
        center,
        radiusMiles: 1,
        gridSize: 2,
        filters: [{ kind: "range", field: "SALESDTTM", min: "not-a-date" }],
      })
    ).rejects.toMatchObject({ code: "INVALID_DATE" });
    expect(registry.queryPage).not.toHaveBeenCalled();
  });

  it("applies sale dates after fetching", async () => {
    const registry = fakeRegistry([
      parcel(1, center, { SALESDTTM: 1577836800000 }), // 2020-01-01
      parcel(2, center, { SALESDTTM: 1546300800000 }), // 2019-01-01
      parcel(3, center),
    ]);
    const { clock } = fakeClock();

    const result = await gridRadiusSearch(
      registry,
      {
        center,
        radiusMiles: 1,
        gridSize: 1,
        filters: [
          { kind: "range", field: "SALESDTTM", min: "2019-06-01" },
          { kind: "range", field: "SALESAMT", min: 50000 },
        ],
      },
      { clock }
    );

    expect(registry.queries[0].where).toBe("SALESAMT >= 50000");
    expect(result.records.map((r) => r.OBJECTID)).toEqual([1]);
    expect(result.records[0].SALESDTTM_FORMATTED).toBe("2020-01-01");
    expect(result.stats).toMatchObject({ withinRadius: 3, returned: 1 });
  });

  it("takes a slot from the limiter for the lookup and every page", async () => {
    const registry = fakeRegistry([parcel(5, center)]);
    const { limiter, waitForSlot } = noWaitLimiter();
    const { clock } = fakeClock();

    await gridRadiusSearch(
      registry,
      { center: { catastro: "000-000-000-5" }, radiusMiles: 1, gridSize: 2 },
      { clock, limiter }
    );

    expect(waitForSlot).toHaveBeenCalledTimes(5);
  });

  it("reports progress per cell", async () => {
    const registry = fakeRegistry([parcel(1, center)]);
    const onCell = vi.fn();
    const { clock } = fakeClock();

    await gridRadiusSearch(registry, { center, radiusMiles: 1, gridSize: 1 }, { clock, onCell });

    expect(onCell).toHaveBeenCalledWith({ cellIndex: 0, cells: 1, received: 1 });
  });
});

describe("municipioSearch", () => {
  it("queries by municipio and enriches without distances", async () => {
    const registry = fakeRegistry([parcel(1, center, { SALESDTTM: 1577836800000 })]);
    const { clock } = fakeClock();

    const result = await municipioSearch(
      registry,
      {
        municipio: " SAN JUAN ",
        filters: [{ kind: "range", field: "SALESAMT", min: 50000 }],
      },
      { clock }
    );

    const [descriptor] = registry.queries;
    expect(descriptor.where).toBe("MUNICIPIO = 'SAN JUAN' AND SALESAMT >= 50000");
    expect(descriptor.geometry).toBeUndefined();
    expect(result.center).toBeNull();
    expect(result.records).toHaveLength(1);
    expect(result.records[0].SALESDTTM_FORMATTED).toBe("2020-01-01");
    expect(result.records[0].MAP_LINK).toBe(
      "https://www.google.com/maps/place/18%C2%B027%2755.8%22N%2066%C2%B006%2720.5%22W/" +
        `@18.4655,${center.lon - 0.0025803},1146m/data=!3m2!1e3!4b1` +
        "!4m4!3m3!8m2!3d18.4655!4d-66.1057?entry=ttu"
    );
    expect("DISTANCE_MILES" in result.records[0]).toBe(false);
  });

  it("rejects an empty municipio", async () => {
    await expect(
      municipioSearch(fakeRegistry([]), { municipio: "  " })
    ).rejects.toMatchObject({ code: "INVALID_FILTER" });
  });
});

describe("catastroSearch", () => {
  it("returns the enriched parcel", async () => {
    const registry = fakeRegistry([parcel(7, center, { CABIDA: 420 })]);

    const result = await catastroSearch(registry, "000-000-000-7");

    expect(result.center).toEqual(center);
    expect(result.records).toHaveLength(1);
    expect(result.records[0]).toMatchObject({ OBJECTID: 7, CABIDA: 420 });
    expect(typeof result.records[0].MAP_LINK).toBe("string");
    expect(result.stats.returned).toBe(1);
  });

  it("reports a missing parcel", async () => {
    const result = await catastroSearch(fakeRegistry([]), "404");

    expect(result.records).toEqual([]);
    expect(result.advisories).toEqual([
      { kind: "lookup_failure", catastro: "404", message: "No parcel found for catastro 404" },
    ]);
  });
});
