import type { ProbeResult } from "../lib/probe";
import { ageInDays, parseTimestamp } from "../lib/timestamps";
import type {
  AbuseConfidence,
  CertificateSummary,
  DnsblHit,
  FraudScore,
  GeoSummary,
  RiskLabel,
  Signal,
  SignalValue,
  WhoisSummary
} from "../types/diagnostics";
import type { ScoringConfig } from "./weights";

export const MEDIUM_THRESHOLD = 25;
export const HIGH_THRESHOLD = 50;
export const CRITICAL_THRESHOLD = 75;

export type ProbedIp = {
  ip: string;
  geo: ProbeResult<GeoSummary>;
};

export type ReputationFindings = {
  dnsblHits: DnsblHit[];
  abuseIpDb: ProbeResult<AbuseConfidence>;
  ipqs: ProbeResult<FraudScore>;
};

export type ScoringInput = {
  whois: ProbeResult<WhoisSummary>;
  certificate: CertificateSummary;
  ipDetails: ProbedIp[];
  reputation: ReputationFindings;
};

export type ScoringContext = {
  input: ScoringInput;
  config: ScoringConfig;
  createdAt?: Date;
  ageDays?: number;
  firstIp?: ProbedIp;
};

// Each module sees the score accumulated by the modules before it.
export type RiskModule = (ctx: ScoringContext, runningScore: number) => Signal[];

export function parseScoringContext(input: ScoringInput, config: ScoringConfig, now: Date): ScoringContext {
  const createdAt = input.whois.status === "ok" ? parseTimestamp(input.whois.data.creation_date) : undefined;
  return {
    input,
    config,
    createdAt,
    ageDays: createdAt ? ageInDays(createdAt, now) : undefined,
    firstIp: input.ipDetails[0]
  };
}

export function signal(name: string, impact: number, details: Record<string, SignalValue> = {}): Signal {
  return { ...details, name, impact };
}

export function boundScore(score: number) {
  return Math.max(0, Math.min(100, score));
}

// Ties go to the even neighbour: 24.5 stays Low, 25.5 becomes 26.
export function roundHalfEven(value: number) {
  const floor = Math.floor(value);
  if (value - floor !== 0.5) return Math.round(value);
  return floor % 2 === 0 ? floor : floor + 1;
}

export function clampScore(score: number) {
  return Math.max(0, Math.min(100, roundHalfEven(score)));
}

export function getRiskLabel(score: number): RiskLabel {
  if (score >= CRITICAL_THRESHOLD) return "Critical";
  if (score >= HIGH_THRESHOLD) return "High";
  if (score >= MEDIUM_THRESHOLD) return "Medium";
  return "Low";
}
