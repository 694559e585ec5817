import { env, loadDiagnosticSettings, type DiagnosticSettings } from "../config/env";
import { type ProbeResult, dataOf, mapResult } from "../lib/probe";
import { type ProbedIp, evaluateRisk } from "../risk";
import { type ScoringConfig, defaultScoringConfig, withHomeCountry } from "../risk/weights";
import type { DiagnosticResult, VerboseExtension } from "../types/diagnostics";
import { type TlsHandshake, probeCertificate, tlsHandshake } from "./certificate";
import { locateIp } from "./geolocation";
import type { FetchLike } from "./http";
import { checkReputation, noReputationFindings, toReputationBundle } from "./reputation";
import {
  type DnsClient,
  type WhoisLookup,
  createDnsClient,
  domainFromEmail,
  resolve,
  resolveMailExchangers,
  resolveRecords
} from "./resolver";

export type DiagnosticDeps = {
  dns: DnsClient;
  fetchImpl: FetchLike;
  handshake: TlsHandshake;
};

export type DiagnoseOptions = {
  verbose?: boolean;
  settings?: DiagnosticSettings;
  scoring?: ScoringConfig;
  deps?: Partial<DiagnosticDeps>;
  now?: Date;
  signal?: AbortSignal;
};

type SoftFailure = { probe: string; error: string };

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    const nested: unknown[] = Object.values(value);
    nested.forEach(deepFreeze);
  }
  return value;
}

function errorOf(probe: string, result: ProbeResult<unknown> | undefined): SoftFailure[] {
  return result?.status === "error" ? [{ probe, error: result.error }] : [];
}

function reportSoftFailures(domain: string, failures: SoftFailure[]) {
  if (!env.logProbeFailures) return;
  for (const failure of failures) {
    console.warn(JSON.stringify({ level: "warn", domain, ...failure, at: new Date().toISOString() }));
  }
}

async function verboseExtension(
  domain: string,
  addresses: string[],
  whois: ProbeResult<WhoisLookup>,
  dns: DnsClient
): Promise<{ extension: VerboseExtension; failures: SoftFailure[] }> {
  const [aaaa, mx] = await Promise.all([resolveRecords(dns, domain, "AAAA"), resolveMailExchangers(dns, domain)]);
  const extension: VerboseExtension = {
    dns: { A: addresses, AAAA: dataOf(aaaa) ?? [], MX: dataOf(mx) ?? [] }
  };
  if (whois.status === "ok") extension.domain_whois_full = whois.data.record;
  else if (whois.status === "error") extension.domain_whois_full_error = whois.error;
  return { extension, failures: [...errorOf("dns_aaaa", aaaa), ...errorOf("dns_mx", mx)] };
}

/**
 * Runs every probe for the email's domain and scores the findings. Only a
 * malformed address rejects; each probe failure is recorded in the result.
 */
export async function diagnose(email: string, options: DiagnoseOptions = {}): Promise<DiagnosticResult> {
  const domain = domainFromEmail(email);
  const settings = options.settings ?? loadDiagnosticSettings();
  const scoring = options.scoring ?? withHomeCountry(defaultScoringConfig, settings.homeCountry);
  const signal = options.signal;
  const dns = options.deps?.dns ?? createDnsClient(settings.timeoutMs, signal);
  const http = { fetchImpl: options.deps?.fetchImpl ?? fetch, timeoutMs: settings.timeoutMs, signal };

  signal?.throwIfAborted();
  const target = await resolve(email, { ...http, dns, rdapBaseUrl: settings.rdapBaseUrl });
  const addresses = dataOf(target.addresses) ?? [];
  const firstIp = addresses[0];

  signal?.throwIfAborted();
  const [certificate, geo, findings] = await Promise.all([
    probeCertificate(addresses.length > 0 ? domain : `www.${domain}`, {
      timeoutMs: settings.timeoutMs,
      handshake: options.deps?.handshake ?? tlsHandshake,
      signal
    }),
    firstIp ? locateIp(firstIp, { ...http, baseUrl: settings.geoApiBaseUrl }) : undefined,
    firstIp
      ? checkReputation(firstIp, {
          ...http,
          dns,
          dnsblZones: settings.dnsblZones,
          abuseIpDbKey: settings.abuseIpDbKey,
          ipqsKey: settings.ipqsKey
        })
      : undefined
  ]);

  const ipDetails: ProbedIp[] = firstIp && geo ? [{ ip: firstIp, geo }] : [];
  const whois = mapResult(target.whois, (lookup) => lookup.summary);
  const reputation = findings ?? noReputationFindings();
  const assessment = evaluateRisk(
    { whois, certificate: certificate.summary, ipDetails, reputation },
    { config: scoring, now: options.now }
  );

  const { tls_valid, ...issuer } = certificate.summary;
  const result: DiagnosticResult = {
    input_email: email,
    domain,
    domain_whois: whois.status === "ok" ? whois.data : { error: whois.status === "error" ? whois.error : "domain whois unavailable" },
    ssl: { tls_valid },
    issuer,
    ip_details: ipDetails.map(({ ip, geo: located }) => ({
      ip,
      geo: located.status === "ok" ? located.data : { error: located.status === "error" ? located.error : "geo unavailable" }
    })),
    reputation: findings ? toReputationBundle(findings) : {},
    risk_score: assessment.score,
    risk_label: assessment.label,
    signals: assessment.signals
  };

  const failures: SoftFailure[] = [
    ...errorOf("whois", target.whois),
    ...errorOf("dns_a", target.addresses),
    ...certificate.failures.map((error) => ({ probe: "tls", error })),
    ...errorOf("geo", geo),
    ...errorOf("abuseipdb", reputation.abuseIpDb),
    ...errorOf("ipqs", reputation.ipqs)
  ];

  if (options.verbose) {
    signal?.throwIfAborted();
    const verbose = await verboseExtension(domain, addresses, target.whois, dns);
    Object.assign(result, verbose.extension);
    failures.push(...verbose.failures);
  }

  reportSoftFailures(domain, failures);
  return deepFreeze(result);
}
