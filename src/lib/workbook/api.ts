export const DEFAULT_WORKBOOK_URL = import.meta.env.VITE_WORKBOOK_URL ?? "/api/workbook";

export type FetchedWorkbook = {
  bytes: ArrayBuffer;
  source: string;
};

export const fetchDefaultWorkbook = async (
  url: string = DEFAULT_WORKBOOK_URL
): Promise<FetchedWorkbook> => {
  const response = await fetch(url);
  if (!response.ok) {
    const message = await response.text();
    throw new Error(message || `Request failed with status ${response.status}`);
  }
  return {
    bytes: await response.arrayBuffer(),
    source: response.headers.get("X-Workbook-Source") ?? url
  };
};
