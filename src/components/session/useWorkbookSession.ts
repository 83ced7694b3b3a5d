import { useCallback, useState } from "react";
import { createDashboardSession, type SessionSnapshot } from "../../lib/session/session";
import { fetchDefaultWorkbook } from "../../lib/workbook/api";
import type { Sheet } from "../../lib/workbook/types";

export type WorkbookSessionStatus = "idle" | "loading" | "ready" | "needs-upload";

const DEFAULT_WORKBOOK_MISSING =
  "Could not find Data.xlsx automatically. Upload the workbook to continue.";

export const useWorkbookSession = () => {
  const [session] = useState(createDashboardSession);
  const [snapshot, setSnapshot] = useState<SessionSnapshot>(() => session.snapshot());
  const [status, setStatus] = useState<WorkbookSessionStatus>("idle");
  const [error, setError] = useState<string | null>(null);

  const applyBytes = useCallback(
    (bytes: ArrayBuffer, source: string, fileName?: string): boolean => {
      const result = session.load(bytes, source, fileName);
      const next = session.snapshot();
      setSnapshot(next);
      setStatus(next.loaded ? "ready" : "needs-upload");
      setError(result.ok ? null : result.error.message);
      return result.ok;
    },
    [session]
  );

  const loadDefault = useCallback(async () => {
    setStatus("loading");
    try {
      const { bytes, source } = await fetchDefaultWorkbook();
      applyBytes(bytes, source);
    } catch (fetchError) {
      console.info("[workbook] default workbook unavailable", {
        message: fetchError instanceof Error ? fetchError.message : String(fetchError)
      });
      setStatus(session.snapshot().loaded ? "ready" : "needs-upload");
      setError(DEFAULT_WORKBOOK_MISSING);
    }
  }, [applyBytes, session]);

  const loadFile = useCallback(
    async (file: File) => {
      setStatus("loading");
      try {
        const bytes = await file.arrayBuffer();
        applyBytes(bytes, file.name, file.name);
      } catch (readError) {
        const message = readError instanceof Error ? readError.message : "Unknown read error.";
        console.error("[workbook] upload read failed", { fileName: file.name, message });
        setStatus(session.snapshot().loaded ? "ready" : "needs-upload");
        setError(message);
      }
    },
    [applyBytes, session]
  );

  const reset = useCallback(() => {
    session.reset();
    setSnapshot(session.snapshot());
    setStatus("needs-upload");
    setError(null);
  }, [session]);

  const recordExport = useCallback(
    (sheet: Sheet, fileName: string) => {
      session.record("CSV_EXPORTED", { sheet: sheet.name, rows: sheet.rowCount, fileName });
      setSnapshot(session.snapshot());
    },
    [session]
  );

  return { snapshot, status, error, loadDefault, loadFile, reset, recordExport };
};
