function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Reads `data.items[].url` from a search API body; items without a usable url are skipped. */
export function parseSearchApiResponse(body: unknown, baseUrl: string): string[] {
  if (!isRecord(body) || !isRecord(body.data) || !Array.isArray(body.data.items)) {
    return [];
  }

  const urls: string[] = [];
  for (const item of body.data.items) {
    if (!isRecord(item) || typeof item.url !== "string" || item.url.length === 0) {
      continue;
    }
    let absolute: string;
    try {
      absolute = new URL(item.url, baseUrl).toString();
    } catch {
      continue;
    }
    if (!urls.includes(absolute)) {
      urls.push(absolute);
    }
  }
  return urls;
}
