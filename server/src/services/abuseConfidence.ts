import { z } from "zod";
import { type ProbeResult, absent, failed, ok, settle } from "../lib/probe";
import type { AbuseConfidence } from "../types/diagnostics";
import { type HttpProbeOptions, getJson } from "./http";

export const ABUSEIPDB_CHECK_URL = "https://api.abuseipdb.com/api/v2/check";

const abuseIpDbSchema = z.object({
  data: z
    .object({
      abuseConfidenceScore: z.number().nullish(),
      totalReports: z.number().nullish()
    })
    .default({})
});

export async function checkAbuseConfidence(
  ip: string,
  apiKey: string | undefined,
  opts: HttpProbeOptions
): Promise<ProbeResult<AbuseConfidence>> {
  if (!apiKey) return absent();
  return settle("abuseipdb failed", async () => {
    const query = new URLSearchParams({ ipAddress: ip, maxAgeInDays: "365" });
    const response = await getJson(`${ABUSEIPDB_CHECK_URL}?${query.toString()}`, { ...opts, headers: { Key: apiKey } });
    if (!response.ok) return failed(`abuseipdb status ${response.status}`);
    const { data } = abuseIpDbSchema.parse(response.body);
    return ok({ confidence_score: data.abuseConfidenceScore ?? null, total_reports: data.totalReports ?? null });
  });
}
