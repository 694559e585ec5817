import type { Signal } from "../types/diagnostics";
import { type ScoringContext, signal } from "./core";

export function reputationSignalsModule(ctx: ScoringContext): Signal[] {
  if (!ctx.firstIp) return [];
  const weights = ctx.config.reputation;
  const { dnsblHits, abuseIpDb, ipqs } = ctx.input.reputation;
  const signals: Signal[] = [];

  const hit = dnsblHits[0];
  if (hit) {
    signals.push(signal("dnsbl_listed", hit.weight, { zone: hit.zone, txt: hit.txt }));
  }

  if (abuseIpDb.status === "ok" && typeof abuseIpDb.data.confidence_score === "number") {
    const confidence = abuseIpDb.data.confidence_score;
    const impact = Math.min(confidence * weights.abuseIpDbMultiplier, weights.abuseIpDbCap);
    signals.push(signal("abuseipdb_confidence", impact, { confidence }));
  }

  if (ipqs.status === "ok" && typeof ipqs.data.fraud_score === "number") {
    const fraud_score = ipqs.data.fraud_score;
    const impact = Math.min(fraud_score * weights.ipqsMultiplier, weights.ipqsCap);
    signals.push(signal("ipqs_fraud_score", impact, { fraud_score }));
  }

  return signals;
}
