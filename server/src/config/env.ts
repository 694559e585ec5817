import dotenv from "dotenv";
import { z } from "zod";
import { ConfigurationError } from "../lib/errors";
import { defaultDnsblZones, type DnsblZone } from "../risk/weights";

dotenv.config();

export const env = {
  nodeEnv: process.env.NODE_ENV || "development",
  port: Number(process.env.PORT || 4000),
  corsOrigin: process.env.CORS_ORIGIN || "http://localhost:3000",
  logProbeFailures: process.env.LOG_PROBE_FAILURES === "true"
};

export type DiagnosticSettings = {
  abuseIpDbKey?: string;
  ipqsKey?: string;
  timeoutMs: number;
  homeCountry: string;
  dnsblZones: DnsblZone[];
  rdapBaseUrl: string;
  geoApiBaseUrl: string;
};

const optionalKey = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const blankAsUndefined = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((value) => (typeof value === "string" && value.trim() === "" ? undefined : value), schema);

const zoneEntry = /^([a-z0-9-]+(?:\.[a-z0-9-]+)+):(\d{1,3})$/i;

export function parseDnsblZones(raw: string): DnsblZone[] {
  const entries = raw
    .split(",")
    .map((entry) => entry.trim())
    .filter(Boolean);
  if (entries.length === 0) throw new ConfigurationError("DNSBL_ZONES is empty", ["DNSBL_ZONES"]);
  return entries.map((entry) => {
    const match = zoneEntry.exec(entry);
    if (!match) throw new ConfigurationError(`DNSBL_ZONES entry "${entry}" must look like zone:weight`, ["DNSBL_ZONES"]);
    return { zone: match[1].toLowerCase(), weight: Number(match[2]) };
  });
}

const settingsSchema = z.object({
  ABUSEIPDB_KEY: optionalKey,
  IPQS_KEY: optionalKey,
  PROBE_TIMEOUT_MS: blankAsUndefined(z.coerce.number().int().min(1_000).max(15_000).default(6_000)),
  HOME_COUNTRY: blankAsUndefined(
    z
      .string()
      .trim()
      .regex(/^[A-Za-z]{2}$/)
      .default("GB")
      .transform((value) => value.toUpperCase())
  ),
  DNSBL_ZONES: z.string().optional(),
  RDAP_BASE_URL: blankAsUndefined(z.string().url().default("https://rdap.org")),
  GEO_API_BASE_URL: blankAsUndefined(z.string().url().default("http://ip-api.com/json"))
});

export function loadDiagnosticSettings(source: NodeJS.ProcessEnv = process.env): DiagnosticSettings {
  const parsed = settingsSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigurationError(`Invalid diagnostic configuration (${issues.join("; ")})`, issues);
  }
  const values = parsed.data;
  return {
    abuseIpDbKey: values.ABUSEIPDB_KEY,
    ipqsKey: values.IPQS_KEY,
    timeoutMs: values.PROBE_TIMEOUT_MS,
    homeCountry: values.HOME_COUNTRY,
    dnsblZones: values.DNSBL_ZONES?.trim() ? parseDnsblZones(values.DNSBL_ZONES) : defaultDnsblZones.map((zone) => ({ ...zone })),
    rdapBaseUrl: values.RDAP_BASE_URL.replace(/\/+$/, ""),
    geoApiBaseUrl: values.GEO_API_BASE_URL.replace(/\/+$/, "")
  };
}
