import type { ErrorMarker } from "../lib/probe";

export type WhoisSummary = {
  domain_name: string | null;
  registrar: string | null;
  creation_date: string | null;
  expiration_date: string | null;
};

export type CertificateSummary = {
  tls_valid: boolean;
  issuer_country: string | null;
  issuer_org: string | null;
  issuer_common_name: string | null;
  issuer_summary: string | null;
  not_after: string | null;
  is_self_signed: boolean;
  is_lets_encrypt: boolean;
};

export type IssuerDetails = Omit<CertificateSummary, "tls_valid">;

export type GeoSummary = {
  country: string | null;
  country_code: string | null;
  region: string | null;
  city: string | null;
  lat: number | null;
  lon: number | null;
  isp: string | null;
  org: string | null;
};

export type IpDetail = {
  ip: string;
  geo: GeoSummary | ErrorMarker;
};

export type DnsblHit = {
  zone: string;
  weight: number;
  txt: string[];
};

export type AbuseConfidence = {
  confidence_score: number | null;
  total_reports: number | null;
};

export type FraudScore = {
  fraud_score: number | null;
  proxy: boolean | null;
  vpn: boolean | null;
  tor: boolean | null;
  recent_abuse: boolean | null;
};

export type ReputationBundle = {
  dnsbl_hits?: DnsblHit[];
  abuseipdb?: AbuseConfidence | ErrorMarker | null;
  ipqs?: FraudScore | ErrorMarker | null;
};

export type SignalValue = string | number | boolean | string[] | null;

export type Signal = {
  name: string;
  impact: number;
  [detail: string]: SignalValue;
};

export type RiskLabel = "Low" | "Medium" | "High" | "Critical";

export type RiskAssessment = {
  score: number;
  label: RiskLabel;
  signals: Signal[];
};

export type MxRecord = {
  preference: number;
  host: string;
};

export type VerboseExtension = {
  dns: {
    A: string[];
    AAAA: string[];
    MX: MxRecord[];
  };
  domain_whois_full?: Record<string, unknown>;
  domain_whois_full_error?: string;
};

export type DiagnosticResult = {
  input_email: string;
  domain: string;
  domain_whois: WhoisSummary | ErrorMarker;
  ssl: { tls_valid: boolean };
  issuer: IssuerDetails;
  ip_details: IpDetail[];
  reputation: ReputationBundle;
  risk_score: number;
  risk_label: RiskLabel;
  signals: Signal[];
} & Partial<VerboseExtension>;
