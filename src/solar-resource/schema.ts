import { Schema } from "effect";

// A monthly cell is either a bare number or a number wrapped in a one-element array.
const MonthlyCellSchema = Schema.Union(
  Schema.Number.pipe(Schema.finite()),
  Schema.transform(
    Schema.Tuple(Schema.Number.pipe(Schema.finite())),
    Schema.Number,
    {
      strict: true,
      decode: ([value]) => value,
      encode: (value) => [value] as const,
    }
  )
);

const MONTH_KEYS = [
  "jan", "feb", "mar", "apr", "may", "jun",
  "jul", "aug", "sep", "oct", "nov", "dec",
] as const;

const MonthKeyedSchema = Schema.Struct({
  jan: MonthlyCellSchema,
  feb: MonthlyCellSchema,
  mar: MonthlyCellSchema,
  apr: MonthlyCellSchema,
  may: MonthlyCellSchema,
  jun: MonthlyCellSchema,
  jul: MonthlyCellSchema,
  aug: MonthlyCellSchema,
  sep: MonthlyCellSchema,
  oct: MonthlyCellSchema,
  nov: MonthlyCellSchema,
  dec: MonthlyCellSchema,
});

// The live API keys monthly values by lowercase month; decode them into calendar order.
const MonthKeyedSeriesSchema = Schema.transform(
  MonthKeyedSchema,
  Schema.Array(Schema.Number),
  {
    strict: true,
    decode: (monthly) => MONTH_KEYS.map((key) => monthly[key]),
    encode: (values) => ({
      jan: values[0],
      feb: values[1],
      mar: values[2],
      apr: values[3],
      may: values[4],
      jun: values[5],
      jul: values[6],
      aug: values[7],
      sep: values[8],
      oct: values[9],
      nov: values[10],
      dec: values[11],
    }),
  }
);

export const MonthlySeriesSchema = Schema.Union(
  Schema.Array(MonthlyCellSchema).pipe(Schema.itemsCount(12)),
  MonthKeyedSeriesSchema
);

const SolarMetricSchema = Schema.Struct({
  monthly: MonthlySeriesSchema,
});

export const SolarResourcePayloadSchema = Schema.Struct({
  outputs: Schema.Struct({
    avg_dni: SolarMetricSchema,
    avg_ghi: SolarMetricSchema,
    avg_lat_tilt: SolarMetricSchema,
  }),
});

export type SolarResourcePayload = typeof SolarResourcePayloadSchema.Type;

export const SolarColumnSchema = Schema.Literal("avg_dni", "avg_ghi", "avg_lat_tilt");

export type SolarColumn = typeof SolarColumnSchema.Type;
