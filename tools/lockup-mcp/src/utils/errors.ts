/** The multiplier table could not be read or parsed. Fatal to the session. */
export class DataLoadError extends Error {
  readonly source: string;

  constructor(source: string, message: string, options?: { cause?: unknown }) {
    super(`Failed to load multiplier table from ${source}: ${message}`, options);
    this.name = "DataLoadError";
    this.source = source;
  }
}

/** No table row matches the requested day. Aborts the current query only. */
export class RowNotFoundError extends Error {
  readonly day: number;
  readonly source: string;

  constructor(day: number, source: string) {
    super(`No matching row found for day=${day}`);
    this.name = "RowNotFoundError";
    this.day = day;
    this.source = source;
  }
}
