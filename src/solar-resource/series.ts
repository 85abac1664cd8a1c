import type { SolarColumn } from "./schema.js";
import type { Month, SolarResourceTable } from "./types.js";

export type SeriesPoint = {
  readonly month: Month;
  readonly value: number;
};

// One column against month, the shape a line chart consumes.
export const toSeries = (
  table: SolarResourceTable,
  column: SolarColumn
): readonly SeriesPoint[] =>
  table.map((row) => ({ month: row.month, value: row[column] }));

export const formatSeries = (points: readonly SeriesPoint[]): string =>
  points.map(({ month, value }) => `${month}=${value}`).join(", ");
