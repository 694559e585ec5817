export type DnsblZone = {
  zone: string;
  weight: number;
};

export type ScoringConfig = {
  homeCountry: string;
  domainAge: {
    missing: number;
    underWeek: number;
    underThreeMonths: number;
    underSixMonths: number;
    underYear: number;
    established: number;
  };
  tls: {
    invalidOrAbsent: number;
    validNonFreeCa: number;
    selfSigned: number;
    freeCa: number;
    freeCaYoungDomainBonus: number;
    youngDomainDays: number;
  };
  geo: {
    high: string[];
    medium: string[];
    unknownImpact: number;
    highImpact: number;
    mediumImpact: number;
    elevateNonHomeToMedium: boolean;
    nonHomeNudge: number;
  };
  reputation: {
    abuseIpDbMultiplier: number;
    abuseIpDbCap: number;
    ipqsMultiplier: number;
    ipqsCap: number;
  };
};

// Priority order: the first listing zone is the only one that counts.
export const defaultDnsblZones: readonly DnsblZone[] = [
  { zone: "zen.spamhaus.org", weight: 60 },
  { zone: "bl.spamcop.net", weight: 40 }
];

export const defaultScoringConfig: ScoringConfig = {
  homeCountry: "GB",
  domainAge: {
    missing: 10,
    underWeek: 40,
    underThreeMonths: 25,
    underSixMonths: 12,
    underYear: 5,
    established: -15
  },
  tls: {
    invalidOrAbsent: 40,
    validNonFreeCa: -10,
    selfSigned: 30,
    freeCa: 45,
    freeCaYoungDomainBonus: 10,
    youngDomainDays: 90
  },
  geo: {
    high: ["CN", "RU", "BY", "IR", "KP"],
    medium: ["TR", "VN", "ID", "NG", "PK", "BR"],
    unknownImpact: 5,
    highImpact: 40,
    mediumImpact: 25,
    elevateNonHomeToMedium: true,
    nonHomeNudge: 5
  },
  reputation: {
    abuseIpDbMultiplier: 0.5,
    abuseIpDbCap: 50,
    ipqsMultiplier: 0.4,
    ipqsCap: 40
  }
};

export function withHomeCountry(config: ScoringConfig, homeCountry: string): ScoringConfig {
  return { ...config, homeCountry: homeCountry.toUpperCase() };
}
