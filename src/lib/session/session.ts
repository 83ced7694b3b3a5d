import { toBytes } from "../import/parseFile";
import { fingerprintBytes } from "../workbook/fingerprint";
import { loadWorkbook } from "../workbook/load";
import type { LoadResult, Workbook } from "../workbook/types";

export type AuditEventType =
  | "WORKBOOK_LOADED"
  | "WORKBOOK_LOAD_FAILED"
  | "WORKBOOK_RESET"
  | "CSV_EXPORTED";

export type AuditEntry = {
  id: string;
  ts: string;
  type: AuditEventType;
  payload: Record<string, unknown>;
};

export type SessionSnapshot = {
  loaded: boolean;
  workbook: Workbook | null;
  source: string | null;
  audit: readonly AuditEntry[];
};

export type DashboardSession = {
  load: (data: ArrayBuffer | Uint8Array, source: string, fileName?: string) => LoadResult;
  reset: () => void;
  record: (type: AuditEventType, payload: Record<string, unknown>) => void;
  snapshot: () => SessionSnapshot;
};

const createAuditEntry = (type: AuditEventType, payload: Record<string, unknown>): AuditEntry => ({
  id: `audit-${Math.random().toString(36).slice(2, 10)}`,
  ts: new Date().toISOString(),
  type,
  payload
});

/**
 * Owns everything one dashboard user has loaded. Nothing here is shared
 * between sessions; create one per app instance.
 */
export const createDashboardSession = (): DashboardSession => {
  let workbook: Workbook | null = null;
  let source: string | null = null;
  let audit: AuditEntry[] = [];
  const cache = new Map<string, Workbook>();

  const record = (type: AuditEventType, payload: Record<string, unknown>) => {
    audit = [createAuditEntry(type, payload), ...audit];
  };

  const load = (
    data: ArrayBuffer | Uint8Array,
    nextSource: string,
    fileName?: string
  ): LoadResult => {
    const bytes = toBytes(data);
    const fingerprint = fingerprintBytes(bytes);
    const cached = cache.get(fingerprint);
    const result: LoadResult = cached
      ? { ok: true, workbook: cached }
      : loadWorkbook(bytes, { fileName });

    if (!result.ok) {
      console.error("[workbook] load failed", {
        source: nextSource,
        code: result.error.code,
        message: result.error.message,
        details: result.error.details
      });
      record("WORKBOOK_LOAD_FAILED", {
        source: nextSource,
        code: result.error.code,
        message: result.error.message
      });
      return result;
    }

    cache.set(fingerprint, result.workbook);
    workbook = result.workbook;
    source = nextSource;
    console.info("[workbook] loaded", {
      source: nextSource,
      fingerprint,
      sheets: result.workbook.sheetNames.length,
      cached: Boolean(cached)
    });
    record("WORKBOOK_LOADED", {
      source: nextSource,
      sheets: result.workbook.sheetNames.length,
      cached: Boolean(cached)
    });
    return result;
  };

  const reset = () => {
    workbook = null;
    source = null;
    cache.clear();
    record("WORKBOOK_RESET", {});
  };

  const snapshot = (): SessionSnapshot => ({
    loaded: workbook !== null,
    workbook,
    source,
    audit
  });

  return { load, reset, record, snapshot };
};
