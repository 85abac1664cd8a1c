import { describe, it, expect } from "@effect/vitest";
import { formatSeries, toSeries } from "./series.js";
import { MONTHS, type SolarResourceTable } from "./types.js";

describe("toSeries", () => {
  const table: SolarResourceTable = MONTHS.map((month, index) => ({
    month,
    avg_dni: index + 1,
    avg_ghi: (index + 1) * 10,
    avg_lat_tilt: (index + 1) * 100,
  }));

  it("should project the chosen column against month", () => {
    const series = toSeries(table, "avg_ghi");

    expect(series).toHaveLength(12);
    expect(series[0]).toEqual({ month: "Jan", value: 10 });
    expect(series[11]).toEqual({ month: "Dec", value: 120 });
  });

  it("should format points as month=value pairs", () => {
    expect(formatSeries(toSeries(table, "avg_lat_tilt").slice(0, 3))).toBe(
      "Jan=100, Feb=200, Mar=300"
    );
  });
});
