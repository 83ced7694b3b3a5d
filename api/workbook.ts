import { randomUUID } from "crypto";
import { readFile } from "fs/promises";
import path from "path";
import { loadWorkbookApiConfig, type WorkbookApiConfig } from "./config";

const XLSX_CONTENT_TYPE = "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet";

export type WorkbookRequest = {
  method?: string;
};

export type WorkbookResponse = {
  statusCode: number;
  setHeader: (name: string, value: string) => unknown;
  end: (body?: string | Uint8Array) => unknown;
};

type FoundWorkbook = {
  path: string;
  bytes: Uint8Array;
};

const jsonResponse = (
  res: WorkbookResponse,
  statusCode: number,
  payload: Record<string, unknown>
) => {
  res.statusCode = statusCode;
  res.setHeader("Content-Type", "application/json");
  res.end(JSON.stringify(payload));
};

const createRequestId = (): string => {
  try {
    return randomUUID();
  } catch {
    return `req-${Math.random().toString(36).slice(2, 10)}`;
  }
};

const isMissingFileError = (error: unknown): boolean =>
  error instanceof Error && "code" in error && (error.code === "ENOENT" || error.code === "EISDIR");

const logFailure = (requestId: string, error: unknown, fallbackMessage: string) => {
  const payload =
    error instanceof Error
      ? { message: error.message, stack: error.stack }
      : { message: fallbackMessage, stack: undefined };
  console.error("[workbook-api] fail", { requestId, ...payload });
};

export const findWorkbook = async (
  candidates: readonly string[],
  baseDir: string
): Promise<FoundWorkbook | null> => {
  for (const candidate of candidates) {
    const resolved = path.resolve(baseDir, candidate);
    try {
      const bytes = await readFile(resolved);
      if (bytes.length > 0) {
        return { path: candidate, bytes: new Uint8Array(bytes) };
      }
    } catch (error) {
      if (!isMissingFileError(error)) {
        throw error;
      }
    }
  }
  return null;
};

export const createWorkbookHandler =
  (options: { config?: WorkbookApiConfig; baseDir?: string } = {}) =>
  async (req: WorkbookRequest, res: WorkbookResponse): Promise<void> => {
    const requestId = createRequestId();
    const { candidates } = options.config ?? loadWorkbookApiConfig();
    console.info("[workbook-api] start", { requestId, method: req.method, candidates });

    if (req.method !== "GET") {
      return jsonResponse(res, 405, { ok: false, error: "Method Not Allowed", requestId });
    }

    try {
      const found = await findWorkbook(candidates, options.baseDir ?? process.cwd());
      if (!found) {
        logFailure(requestId, null, "Workbook not found");
        return jsonResponse(res, 404, { ok: false, error: "Workbook not found", requestId });
      }
      console.info("[workbook-api] success", {
        requestId,
        source: found.path,
        bytes: found.bytes.length
      });
      res.statusCode = 200;
      res.setHeader("Content-Type", XLSX_CONTENT_TYPE);
      res.setHeader("X-Workbook-Source", found.path);
      res.end(found.bytes);
    } catch (error) {
      logFailure(requestId, error, "Workbook read failed");
      return jsonResponse(res, 500, { ok: false, error: "Workbook read failed", requestId });
    }
  };

export default createWorkbookHandler();
