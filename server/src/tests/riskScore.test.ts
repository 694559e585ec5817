import test from "node:test";
import assert from "node:assert/strict";
import { absent, failed, ok } from "../lib/probe";
import { type ReputationFindings, type ScoringInput, evaluateRisk } from "../risk";
import { getRiskLabel, roundHalfEven } from "../risk/core";
import { defaultScoringConfig, withHomeCountry } from "../risk/weights";
import type { CertificateSummary, WhoisSummary } from "../types/diagnostics";
import { NOW, daysBefore } from "./fakes";

const validCert: CertificateSummary = {
  tls_valid: true,
  issuer_country: "US",
  issuer_org: "Example Trust Services",
  issuer_common_name: "Example CA R1",
  issuer_summary: "Example CA R1",
  not_after: "2026-01-01T00:00:00.000Z",
  is_self_signed: false,
  is_lets_encrypt: false
};

const freeCaCert: CertificateSummary = {
  ...validCert,
  issuer_org: "Let's Encrypt",
  issuer_common_name: "R11",
  issuer_summary: "R11",
  is_lets_encrypt: true
};

const noFindings: ReputationFindings = { dnsblHits: [], abuseIpDb: absent(), ipqs: absent() };

function registered(days: number) {
  const whois: WhoisSummary = {
    domain_name: "example.test",
    registrar: null,
    creation_date: daysBefore(days),
    expiration_date: null
  };
  return ok(whois);
}

function inCountry(country_code: string) {
  return [
    {
      ip: "203.0.113.10",
      geo: ok({ country: null, country_code, region: null, city: null, lat: null, lon: null, isp: null, org: null })
    }
  ];
}

function scoringInput(overrides: Partial<ScoringInput>): ScoringInput {
  return { whois: registered(400), certificate: validCert, ipDetails: inCountry("GB"), reputation: noFindings, ...overrides };
}

const score = (input: ScoringInput) => evaluateRisk(input, { now: NOW });
const names = (input: ScoringInput) => score(input).signals.map((item) => item.name);

test("missing or failed registration data adds the missing-date signal", () => {
  const noDate = score(scoringInput({ whois: ok({ domain_name: null, registrar: null, creation_date: null, expiration_date: null }) }));
  assert.deepEqual(noDate.signals[0], { name: "missing_creation_date", impact: 10 });

  const failedLookup = score(scoringInput({ whois: failed("domain whois failed: Error: timeout") }));
  assert.deepEqual(failedLookup.signals[0], { name: "missing_creation_date", impact: 10 });
});

test("domain age buckets are half-open", () => {
  assert.deepEqual(score(scoringInput({ whois: registered(3) })).signals[0], { name: "age_<7d", impact: 40, age_days: 3 });
  assert.equal(names(scoringInput({ whois: registered(7) }))[0], "age_7d_to_3m");
  assert.equal(names(scoringInput({ whois: registered(90) }))[0], "age_3m_to_6m");
  assert.equal(names(scoringInput({ whois: registered(180) }))[0], "age_6m_to_12m");
  assert.deepEqual(score(scoringInput({ whois: registered(365) })).signals[0], { name: "age_>12m", impact: -15, age_days: 365 });
});

test("a free-CA certificate on a young domain compounds to at least 55 points", () => {
  const result = score(scoringInput({ whois: registered(30), certificate: freeCaCert, ipDetails: [] }));
  assert.deepEqual(result.signals, [
    { name: "age_7d_to_3m", impact: 25, age_days: 30 },
    { name: "lets_encrypt", impact: 55, issuer: "R11" },
    { name: "geo_unknown", impact: 5 }
  ]);
  assert.equal(result.score, 85);
  assert.equal(result.label, "Critical");
});

test("a young free-CA domain outscores an established one by the age delta plus the bonus", () => {
  const young = score(scoringInput({ whois: registered(10), certificate: freeCaCert }));
  const established = score(scoringInput({ whois: registered(400), certificate: freeCaCert }));
  assert.equal(young.score, 80);
  assert.equal(established.score, 30);
  assert.equal(young.score - established.score, 50);
});

test("the free-CA bonus stops once the domain is 90 days old", () => {
  const result = score(scoringInput({ whois: registered(120), certificate: freeCaCert, ipDetails: [] }));
  assert.deepEqual(result.signals[1], { name: "lets_encrypt", impact: 45, issuer: "R11" });
  assert.equal(result.score, 62);
  assert.equal(result.label, "High");
});

test("an invalid self-signed certificate scores both signals", () => {
  const certificate = { ...validCert, tls_valid: false, is_self_signed: true };
  const result = score(scoringInput({ certificate }));
  assert.deepEqual(names(scoringInput({ certificate })), ["age_>12m", "tls_invalid_or_absent", "self_signed"]);
  assert.equal(result.score, 55);
});

test("a foreign low-risk country lifts a Low score exactly to Medium", () => {
  const result = score(scoringInput({ whois: registered(30), ipDetails: inCountry("US") }));
  assert.deepEqual(result.signals, [
    { name: "age_7d_to_3m", impact: 25, age_days: 30 },
    { name: "tls_valid_non_lets_encrypt", impact: -10 },
    { name: "geo_non_home_elevate", impact: 10, country_code: "US" }
  ]);
  assert.equal(result.score, 25);
  assert.equal(result.label, "Medium");
});

test("an already elevated score only gets the non-home nudge", () => {
  const result = score(scoringInput({ whois: registered(3), ipDetails: inCountry("US") }));
  assert.deepEqual(result.signals[2], { name: "geo_non_home_nudge", impact: 5, country_code: "US" });
  assert.equal(result.score, 35);
});

test("country lists and the home country", () => {
  assert.deepEqual(score(scoringInput({ ipDetails: inCountry("RU") })).signals[2], {
    name: "geo_high",
    impact: 40,
    country_code: "RU"
  });
  assert.deepEqual(score(scoringInput({ ipDetails: inCountry("BR") })).signals[2], {
    name: "geo_medium",
    impact: 25,
    country_code: "BR"
  });
  assert.equal(score(scoringInput({})).signals.length, 2);

  const usHome = evaluateRisk(scoringInput({ ipDetails: inCountry("US") }), {
    config: withHomeCountry(defaultScoringConfig, "us"),
    now: NOW
  });
  assert.deepEqual(
    usHome.signals.map((item) => item.name),
    ["age_>12m", "tls_valid_non_lets_encrypt"]
  );
});

test("a failed geolocation counts as unknown", () => {
  const ipDetails = [{ ip: "203.0.113.10", geo: failed("geo failed: private range") }];
  assert.deepEqual(score(scoringInput({ ipDetails })).signals[2], { name: "geo_unknown", impact: 5 });
});

test("reputation findings add capped impacts and the score saturates at 100", () => {
  const reputation: ReputationFindings = {
    dnsblHits: [{ zone: "zen.spamhaus.org", weight: 60, txt: [] }],
    abuseIpDb: ok({ confidence_score: 100, total_reports: 40 }),
    ipqs: ok({ fraud_score: 100, proxy: true, vpn: false, tor: false, recent_abuse: true })
  };
  const result = score(scoringInput({ reputation }));
  assert.deepEqual(result.signals.slice(2), [
    { name: "dnsbl_listed", impact: 60, zone: "zen.spamhaus.org", txt: [] },
    { name: "abuseipdb_confidence", impact: 50, confidence: 100 },
    { name: "ipqs_fraud_score", impact: 40, fraud_score: 100 }
  ]);
  assert.equal(result.score, 100);
  assert.equal(result.label, "Critical");
});

test("fractional impacts are rounded once at the end", () => {
  const reputation: ReputationFindings = { ...noFindings, abuseIpDb: ok({ confidence_score: 45, total_reports: 3 }) };
  const result = score(scoringInput({ whois: registered(30), reputation }));
  assert.deepEqual(result.signals[2], { name: "abuseipdb_confidence", impact: 22.5, confidence: 45 });
  assert.equal(result.score, 38);
  assert.equal(result.label, "Medium");
});

test("a half-point total on a band edge rounds to the even score", () => {
  const reputation: ReputationFindings = { ...noFindings, abuseIpDb: ok({ confidence_score: 19, total_reports: 1 }) };
  const result = score(scoringInput({ whois: registered(30), reputation }));
  assert.deepEqual(result.signals[2], { name: "abuseipdb_confidence", impact: 9.5, confidence: 19 });
  assert.equal(result.score, 24);
  assert.equal(result.label, "Low");
});

test("half-point totals below an odd integer round down", () => {
  const reputation: ReputationFindings = { ...noFindings, abuseIpDb: ok({ confidence_score: 43, total_reports: 2 }) };
  const result = score(scoringInput({ whois: registered(30), reputation }));
  assert.equal(result.score, 36);
  assert.equal(result.label, "Medium");
});

test("roundHalfEven only changes exact ties", () => {
  assert.deepEqual(
    [24.5, 25.5, 36.5, 37.5, 36.4, 36.6, -12.5, 0.5].map(roundHalfEven),
    [24, 26, 36, 38, 36, 37, -12, 0]
  );
});

test("reputation is ignored when no address was resolved", () => {
  const reputation: ReputationFindings = { ...noFindings, dnsblHits: [{ zone: "zen.spamhaus.org", weight: 60, txt: [] }] };
  assert.deepEqual(names(scoringInput({ ipDetails: [], reputation })), ["age_>12m", "tls_valid_non_lets_encrypt", "geo_unknown"]);
});

test("negative totals clamp to zero", () => {
  const result = score(scoringInput({}));
  assert.equal(result.score, 0);
  assert.equal(result.label, "Low");
});

test("scoring is deterministic for identical input", () => {
  const input = scoringInput({ whois: registered(30), ipDetails: inCountry("US") });
  assert.deepEqual(score(input), score(input));
});

test("getRiskLabel thresholds", () => {
  assert.deepEqual(
    [0, 24, 25, 49, 50, 74, 75, 100].map(getRiskLabel),
    ["Low", "Low", "Medium", "Medium", "High", "High", "Critical", "Critical"]
  );
});
