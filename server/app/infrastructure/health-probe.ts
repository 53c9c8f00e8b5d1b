import { makeHttpClient } from "./http";

const PROBE_TIMEOUT_MS = 3_000;

/** Resolves to true only when the endpoint answers 200. */
export async function probe(url: string, timeoutMs = PROBE_TIMEOUT_MS): Promise<boolean> {
  const http = makeHttpClient(url, { timeoutMs, retries: 0 });
  try {
    const response = await http.get("");
    return response.status === 200;
  } catch (err) {
    console.error(`Health probe failed: ${err instanceof Error ? err.message : String(err)}`);
    return false;
  }
}
