import { z } from "zod";
import { type ProbeResult, absent, failed, ok, settle } from "../lib/probe";
import type { FraudScore } from "../types/diagnostics";
import { type HttpProbeOptions, getJson } from "./http";

export const IPQS_IP_URL = "https://ipqualityscore.com/api/json/ip";

const flag = z.boolean().nullish();

const ipqsSchema = z.object({
  success: z.boolean().optional(),
  message: z.string().optional(),
  fraud_score: z.number().nullish(),
  proxy: flag,
  vpn: flag,
  tor: flag,
  recent_abuse: flag
});

export async function checkFraudScore(
  ip: string,
  apiKey: string | undefined,
  opts: HttpProbeOptions
): Promise<ProbeResult<FraudScore>> {
  if (!apiKey) return absent();
  return settle("ipqs failed", async () => {
    const url = `${IPQS_IP_URL}/${encodeURIComponent(apiKey)}/${encodeURIComponent(ip)}?strictness=1&allow_public_access_points=true`;
    const response = await getJson(url, opts);
    if (!response.ok) return failed(`ipqs status ${response.status}`);
    const body = ipqsSchema.parse(response.body);
    if (body.success === false) return failed(`ipqs failed: ${body.message ?? "request rejected"}`);
    return ok({
      fraud_score: body.fraud_score ?? null,
      proxy: body.proxy ?? null,
      vpn: body.vpn ?? null,
      tor: body.tor ?? null,
      recent_abuse: body.recent_abuse ?? null
    });
  });
}
