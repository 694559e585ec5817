export type FetchLike = typeof fetch;

export type HttpProbeOptions = {
  fetchImpl: FetchLike;
  timeoutMs: number;
  signal?: AbortSignal;
};

export function requestSignal(timeoutMs: number, signal?: AbortSignal): AbortSignal {
  const timeout = AbortSignal.timeout(timeoutMs);
  return signal ? AbortSignal.any([signal, timeout]) : timeout;
}

export type JsonResponse = { ok: true; status: number; body: unknown } | { ok: false; status: number };

export const USER_AGENT = "email-risk-diagnostics/1.0";

export async function getJson(url: string, opts: HttpProbeOptions & { headers?: Record<string, string> }): Promise<JsonResponse> {
  const response = await opts.fetchImpl(url, {
    method: "GET",
    headers: { Accept: "application/json", "User-Agent": USER_AGENT, ...opts.headers },
    signal: requestSignal(opts.timeoutMs, opts.signal)
  });
  if (!response.ok) {
    await response.text();
    return { ok: false, status: response.status };
  }
  const body: unknown = await response.json();
  return { ok: true, status: response.status, body };
}
