import type { ReputationFindings } from "../risk";
import type { DnsblZone } from "../risk/weights";
import { absent, toWire } from "../lib/probe";
import type { ReputationBundle } from "../types/diagnostics";
import { checkAbuseConfidence } from "./abuseConfidence";
import { checkDnsbl } from "./dnsbl";
import { checkFraudScore } from "./fraudScore";
import type { HttpProbeOptions } from "./http";
import type { DnsClient } from "./resolver";

export type ReputationOptions = HttpProbeOptions & {
  dns: DnsClient;
  dnsblZones: readonly DnsblZone[];
  abuseIpDbKey?: string;
  ipqsKey?: string;
};

export const noReputationFindings = (): ReputationFindings => ({ dnsblHits: [], abuseIpDb: absent(), ipqs: absent() });

export async function checkReputation(ip: string, opts: ReputationOptions): Promise<ReputationFindings> {
  const [dnsblHits, abuseIpDb, ipqs] = await Promise.all([
    checkDnsbl(ip, opts.dnsblZones, opts.dns),
    checkAbuseConfidence(ip, opts.abuseIpDbKey, opts),
    checkFraudScore(ip, opts.ipqsKey, opts)
  ]);
  return { dnsblHits, abuseIpDb, ipqs };
}

export function toReputationBundle(findings: ReputationFindings): ReputationBundle {
  return {
    dnsbl_hits: findings.dnsblHits,
    abuseipdb: toWire(findings.abuseIpDb),
    ipqs: toWire(findings.ipqs)
  };
}
