export type ColumnKind = "numeric" | "boolean" | "temporal" | "text";

export type CellValue = number | boolean | string | null;

/**
 * A normalized column. The `kind` tag fixes the shape of every value, so a
 * column never mixes kinds once it leaves the normalizer.
 *
 * Temporal values are ISO-8601 UTC strings; a cell that did not parse is null.
 * Boolean and text columns are never null.
 */
export type SheetColumn =
  | { readonly name: string; readonly kind: "numeric"; readonly values: readonly (number | null)[] }
  | { readonly name: string; readonly kind: "boolean"; readonly values: readonly boolean[] }
  | { readonly name: string; readonly kind: "temporal"; readonly values: readonly (string | null)[] }
  | { readonly name: string; readonly kind: "text"; readonly values: readonly string[] };

export type Sheet = {
  readonly name: string;
  readonly rowCount: number;
  readonly columns: readonly SheetColumn[];
};

export type SheetRow = Readonly<Record<string, CellValue>>;

export type Workbook = {
  readonly fingerprint: string;
  readonly sheetNames: readonly string[];
  readonly sheets: ReadonlyMap<string, Sheet>;
};

export type LoadErrorCode = "EMPTY_FILE" | "UNSUPPORTED_FORMAT" | "UNREADABLE_FILE" | "NO_SHEETS";

export class LoadError extends Error {
  code: LoadErrorCode;
  details?: string;

  constructor(code: LoadErrorCode, message: string, details?: string) {
    super(message);
    this.name = "LoadError";
    this.code = code;
    this.details = details;
  }
}

export type LoadResult = { ok: true; workbook: Workbook } | { ok: false; error: LoadError };
