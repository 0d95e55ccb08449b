import { fileURLToPath } from "node:url";
import { describe, it, expect, vi, beforeEach, afterEach, afterAll } from "vitest";

const fixture = (name: string) => fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));

// The table source binds to config at import, so each test re-imports it
async function importSource(csv: string, hasHeader: string) {
  vi.stubEnv("LOCKUP_MULTIPLIER_CSV", csv);
  vi.stubEnv("LOCKUP_CSV_HAS_HEADER", hasHeader);
  vi.resetModules();
  return import("../sources/table.js");
}

const errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);

beforeEach(() => {
  errorSpy.mockClear();
});

afterEach(() => {
  vi.unstubAllEnvs();
});

afterAll(() => {
  errorSpy.mockRestore();
});

describe("getMultiplierTable", () => {
  it("loads the configured source with its header convention", async () => {
    const csv = fixture("with-header.csv");
    const source = await importSource(csv, "true");

    const table = source.getMultiplierTable();

    expect(table.source).toBe(csv);
    expect(table.rows.map((r) => r.day)).toEqual([7, 14, 30]);
    expect(source.tableSettings()).toMatchObject({ source: csv, hasHeader: true });
  });

  it("logs the first load only", async () => {
    const csv = fixture("no-header.csv");
    const source = await importSource(csv, "false");

    const first = source.getMultiplierTable();
    const second = source.getMultiplierTable();

    expect(second).toBe(first);
    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(errorSpy).toHaveBeenCalledWith(`Loaded 3 multiplier rows from ${csv}`);
  });

  it("fails with DataLoadError when the header convention does not match", async () => {
    const source = await importSource(fixture("with-header.csv"), "false");
    const { DataLoadError } = await import("../utils/errors.js");

    expect(() => source.getMultiplierTable()).toThrow(DataLoadError);
    expect(errorSpy).not.toHaveBeenCalled();
  });
});

describe("reloadMultiplierTable", () => {
  it("re-reads the source and logs the reload", async () => {
    const csv = fixture("no-header.csv");
    const source = await importSource(csv, "false");

    const first = source.getMultiplierTable();
    const reloaded = source.reloadMultiplierTable();

    expect(reloaded).not.toBe(first);
    expect(reloaded.rows).toEqual(first.rows);
    expect(source.getMultiplierTable()).toBe(reloaded);
    expect(errorSpy).toHaveBeenCalledTimes(2);
    expect(errorSpy).toHaveBeenLastCalledWith(`Reloaded 3 multiplier rows from ${csv}`);
  });
});
