import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createDashboardSession } from "../lib/session/session";
import { encodeText } from "./helpers";

describe("dashboard session", () => {
  beforeEach(() => {
    vi.spyOn(console, "info").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("starts empty", () => {
    const session = createDashboardSession();

    expect(session.snapshot()).toEqual({ loaded: false, workbook: null, source: null, audit: [] });
  });

  it("loads a workbook and records it", () => {
    const session = createDashboardSession();
    const result = session.load(encodeText("State,Amount\nCA,10\n"), "upload.csv", "upload.csv");

    expect(result.ok).toBe(true);
    const snapshot = session.snapshot();
    expect(snapshot.loaded).toBe(true);
    expect(snapshot.source).toBe("upload.csv");
    expect(snapshot.workbook?.sheetNames).toEqual(["upload"]);
    expect(snapshot.audit[0].type).toBe("WORKBOOK_LOADED");
    expect(snapshot.audit[0].payload).toEqual({ source: "upload.csv", sheets: 1, cached: false });
  });

  it("serves identical bytes from the cache", () => {
    const session = createDashboardSession();
    const first = session.load(encodeText("a\n1\n"), "first.csv", "first.csv");
    const second = session.load(encodeText("a\n1\n"), "second.csv", "second.csv");

    expect(first.ok && second.ok && second.workbook === first.workbook).toBe(true);
    expect(session.snapshot().source).toBe("second.csv");
    expect(session.snapshot().audit[0].payload.cached).toBe(true);
  });

  it("keeps the previous workbook when a load fails", () => {
    const session = createDashboardSession();
    session.load(encodeText("a\n1\n"), "data.csv", "data.csv");
    const loaded = session.snapshot().workbook;

    const result = session.load(new Uint8Array(), "empty.xlsx");

    expect(!result.ok && result.error.code).toBe("EMPTY_FILE");
    expect(session.snapshot().workbook).toBe(loaded);
    expect(session.snapshot().audit[0]).toMatchObject({
      type: "WORKBOOK_LOAD_FAILED",
      payload: { source: "empty.xlsx", code: "EMPTY_FILE" }
    });
  });

  it("clears the workbook and cache on reset", () => {
    const session = createDashboardSession();
    session.load(encodeText("a\n1\n"), "data.csv", "data.csv");

    session.reset();

    expect(session.snapshot()).toMatchObject({ loaded: false, workbook: null, source: null });
    expect(session.snapshot().audit[0].type).toBe("WORKBOOK_RESET");

    session.load(encodeText("a\n1\n"), "data.csv", "data.csv");
    expect(session.snapshot().audit[0].payload.cached).toBe(false);
  });

  it("keeps sessions independent", () => {
    const first = createDashboardSession();
    const second = createDashboardSession();
    first.load(encodeText("a\n1\n"), "data.csv", "data.csv");

    expect(second.snapshot().loaded).toBe(false);
  });
});
