import { describeError } from "./errors";

export type ProbeResult<T> =
  | { status: "ok"; data: T }
  | { status: "error"; error: string }
  | { status: "absent" };

export type ErrorMarker = { error: string };

export function ok<T>(data: T): ProbeResult<T> {
  return { status: "ok", data };
}

export function failed<T = never>(error: string): ProbeResult<T> {
  return { status: "error", error };
}

export function absent<T = never>(): ProbeResult<T> {
  return { status: "absent" };
}

export function dataOf<T>(result: ProbeResult<T>): T | undefined {
  return result.status === "ok" ? result.data : undefined;
}

export function mapResult<T, U>(result: ProbeResult<T>, fn: (data: T) => U): ProbeResult<U> {
  return result.status === "ok" ? ok(fn(result.data)) : result;
}

// Wire shape: data as-is, `{error}` for failures, null when the provider was not configured.
export function toWire<T>(result: ProbeResult<T>): T | ErrorMarker | null {
  if (result.status === "ok") return result.data;
  if (result.status === "error") return { error: result.error };
  return null;
}

export async function settle<T>(prefix: string, run: () => Promise<ProbeResult<T>>): Promise<ProbeResult<T>> {
  try {
    return await run();
  } catch (err) {
    return failed(`${prefix}: ${describeError(err)}`);
  }
}
