import { z } from "zod";

export const DEFAULT_WORKBOOK_PATHS = ["Data.xlsx", "data/Data.xlsx"] as const;

const envSchema = z.object({
  WORKBOOK_PATH: z.string().trim().min(1).optional()
});

export type WorkbookApiConfig = {
  candidates: string[];
};

export const loadWorkbookApiConfig = (
  env: Record<string, string | undefined> = process.env
): WorkbookApiConfig => {
  const parsed = envSchema.safeParse({ WORKBOOK_PATH: env.WORKBOOK_PATH });
  const configured = parsed.success ? parsed.data.WORKBOOK_PATH : undefined;
  return {
    candidates: [...(configured ? [configured] : []), ...DEFAULT_WORKBOOK_PATHS]
  };
};
