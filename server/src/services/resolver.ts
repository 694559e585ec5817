import { Resolver } from "node:dns/promises";
import { z } from "zod";
import { InvalidInputError } from "../lib/errors";
import { type ProbeResult, failed, ok, settle } from "../lib/probe";
import { toIsoTimestamp } from "../lib/timestamps";
import type { MxRecord, WhoisSummary } from "../types/diagnostics";
import { type HttpProbeOptions, getJson } from "./http";

export interface DnsClient {
  resolve4(hostname: string): Promise<string[]>;
  resolve6(hostname: string): Promise<string[]>;
  resolveMx(hostname: string): Promise<Array<{ exchange: string; priority: number }>>;
  resolveTxt(hostname: string): Promise<string[][]>;
}

export function createDnsClient(timeoutMs: number, signal?: AbortSignal): DnsClient {
  const resolver = new Resolver({ timeout: timeoutMs, tries: 1 });
  signal?.addEventListener("abort", () => resolver.cancel(), { once: true });
  return resolver;
}

export type WhoisLookup = {
  summary: WhoisSummary;
  record: Record<string, unknown>;
};

export type ResolvedTarget = {
  domain: string;
  whois: ProbeResult<WhoisLookup>;
  addresses: ProbeResult<string[]>;
};

export function domainFromEmail(email: string): string {
  const at = email.indexOf("@");
  if (at < 0) throw new InvalidInputError("Provide an email like name@example.com");
  const domain = email.slice(at + 1).trim().toLowerCase();
  if (!domain) throw new InvalidInputError("Email address has no domain after '@'");
  return domain;
}

const rdapDomainSchema = z
  .object({
    ldhName: z.string().optional(),
    events: z
      .array(z.object({ eventAction: z.string(), eventDate: z.string().optional() }).passthrough())
      .optional(),
    entities: z
      .array(
        z
          .object({
            roles: z.array(z.string()).optional(),
            vcardArray: z
              .tuple([z.string(), z.array(z.array(z.unknown()))])
              .optional()
              .catch(undefined)
          })
          .passthrough()
      )
      .optional()
  })
  .passthrough();

type RdapDomain = z.infer<typeof rdapDomainSchema>;

function eventDate(record: RdapDomain, action: string): string | null {
  const event = record.events?.find((item) => item.eventAction.toLowerCase() === action);
  return toIsoTimestamp(event?.eventDate);
}

function registrarName(record: RdapDomain): string | null {
  const registrar = record.entities?.find((entity) => entity.roles?.includes("registrar"));
  const properties = registrar?.vcardArray?.[1] ?? [];
  for (const property of properties) {
    const value = property[3];
    if (property[0] === "fn" && typeof value === "string" && value.trim()) return value.trim();
  }
  return null;
}

export function summarizeRdap(record: RdapDomain): WhoisSummary {
  return {
    domain_name: record.ldhName ? record.ldhName.toLowerCase() : null,
    registrar: registrarName(record),
    creation_date: eventDate(record, "registration"),
    expiration_date: eventDate(record, "expiration")
  };
}

export async function lookupWhois(
  domain: string,
  opts: HttpProbeOptions & { rdapBaseUrl: string }
): Promise<ProbeResult<WhoisLookup>> {
  return settle("domain whois failed", async () => {
    const response = await getJson(`${opts.rdapBaseUrl}/domain/${encodeURIComponent(domain)}`, {
      ...opts,
      headers: { Accept: "application/rdap+json, application/json" }
    });
    if (!response.ok) return failed(`domain whois failed: rdap status ${response.status}`);
    const record = rdapDomainSchema.parse(response.body);
    return ok({ summary: summarizeRdap(record), record });
  });
}

export async function resolveRecords(
  dns: DnsClient,
  domain: string,
  type: "A" | "AAAA"
): Promise<ProbeResult<string[]>> {
  return settle(`dns ${type} lookup failed`, async () =>
    ok(type === "A" ? await dns.resolve4(domain) : await dns.resolve6(domain))
  );
}

export async function resolveMailExchangers(dns: DnsClient, domain: string): Promise<ProbeResult<MxRecord[]>> {
  return settle("dns MX lookup failed", async () => {
    const records = await dns.resolveMx(domain);
    return ok(
      records
        .map((record) => ({ preference: record.priority, host: record.exchange.replace(/\.$/, "") }))
        .sort((a, b) => a.preference - b.preference)
    );
  });
}

export async function resolve(
  email: string,
  deps: HttpProbeOptions & { dns: DnsClient; rdapBaseUrl: string }
): Promise<ResolvedTarget> {
  const domain = domainFromEmail(email);
  const [whois, addresses] = await Promise.all([lookupWhois(domain, deps), resolveRecords(deps.dns, domain, "A")]);
  return { domain, whois, addresses };
}
