import { Context, Data, Effect } from "effect";

export const MONTHS = [
  "Jan", "Feb", "Mar", "Apr", "May", "Jun",
  "Jul", "Aug", "Sep", "Oct", "Nov", "Dec",
] as const;

export type Month = (typeof MONTHS)[number];

export type SolarResourceRow = {
  readonly month: Month;
  readonly avg_dni: number; // kWh/m²/day
  readonly avg_ghi: number;
  readonly avg_lat_tilt: number;
};

// Always 12 rows, Jan..Dec
export type SolarResourceTable = readonly SolarResourceRow[];

export type SolarResourceQueries = Readonly<Record<string, string | number>>;

export class HttpFailureError extends Data.TaggedError("HttpFailure")<{
  readonly message: string;
  readonly status: number;
  readonly statusText: string;
}> {}

export class ContentTypeMismatchError extends Data.TaggedError("ContentTypeMismatch")<{
  readonly contentType: string;
}> {
  public override readonly message = 'Expected a JSON response from the Solar Resource API.';
}

export class MalformedPayloadError extends Data.TaggedError("MalformedPayload")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export class ApiNotReachableError extends Data.TaggedError("ApiNotReachable") {
  public override readonly message = 'Could not reach the Solar Resource API.';
}

export type SolarResourceError =
  | HttpFailureError
  | ContentTypeMismatchError
  | MalformedPayloadError
  | ApiNotReachableError;

export class SolarResource extends Context.Tag("SolarResource")<
  SolarResource,
  {
    readonly fetchTable: (
      endpoint: string,
      queries: SolarResourceQueries
    ) => Effect.Effect<SolarResourceTable, SolarResourceError>;
  }
>() {}

export type ISolarResource = Context.Tag.Service<typeof SolarResource>;
