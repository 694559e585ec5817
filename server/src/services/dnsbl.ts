import { isIPv4 } from "node:net";
import type { DnsblZone } from "../risk/weights";
import type { DnsblHit } from "../types/diagnostics";
import type { DnsClient } from "./resolver";

/**
 * First-match-wins over an ordered list: candidates are probed one at a time and
 * nothing after the first match is probed.
 */
export function firstMatch<T, R>(
  candidates: readonly T[],
  probe: (candidate: T) => Promise<R | undefined>
): Promise<R | undefined> {
  return candidates.reduce<Promise<R | undefined>>(
    (previous, candidate) => previous.then((found) => (found !== undefined ? found : probe(candidate))),
    Promise.resolve(undefined)
  );
}

export function reverseIpv4(ip: string): string {
  return ip.split(".").reverse().join(".");
}

// NXDOMAIN is the normal "not listed" answer, so any lookup failure reads as unlisted.
async function isListed(dns: DnsClient, query: string): Promise<boolean> {
  return dns.resolve4(query).then(
    (answers) => answers.length > 0,
    () => false
  );
}

async function listingReasons(dns: DnsClient, query: string): Promise<string[]> {
  return dns.resolveTxt(query).then(
    (rows) => rows.map((chunks) => chunks.join("").replace(/^"|"$/g, "")),
    () => []
  );
}

export async function checkDnsbl(ip: string, zones: readonly DnsblZone[], dns: DnsClient): Promise<DnsblHit[]> {
  if (!isIPv4(ip)) return [];
  const reversed = reverseIpv4(ip);

  const hit = await firstMatch(zones, async ({ zone, weight }): Promise<DnsblHit | undefined> => {
    const query = `${reversed}.${zone}`;
    if (!(await isListed(dns, query))) return undefined;
    return { zone, weight, txt: await listingReasons(dns, query) };
  });
  return hit ? [hit] : [];
}
