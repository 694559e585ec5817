import type { Signal } from "../types/diagnostics";
import { MEDIUM_THRESHOLD, type ScoringContext, boundScore, getRiskLabel, signal } from "./core";

function firstCountryCode(ctx: ScoringContext): string | undefined {
  const geo = ctx.firstIp?.geo;
  if (geo?.status !== "ok" || !geo.data.country_code) return undefined;
  return geo.data.country_code.toUpperCase();
}

/**
 * Scores the country of the first resolved IP. A foreign country outside the risk
 * lists lifts a still-Low running score exactly to the Medium boundary; an already
 * elevated score only gets the small nudge.
 */
export function geoSignalsModule(ctx: ScoringContext, runningScore: number): Signal[] {
  const geo = ctx.config.geo;
  const country_code = firstCountryCode(ctx);

  if (!country_code) return [signal("geo_unknown", geo.unknownImpact)];
  if (geo.high.includes(country_code)) return [signal("geo_high", geo.highImpact, { country_code })];
  if (geo.medium.includes(country_code)) return [signal("geo_medium", geo.mediumImpact, { country_code })];
  if (country_code === ctx.config.homeCountry) return [];

  const provisional = boundScore(runningScore);
  if (geo.elevateNonHomeToMedium && getRiskLabel(provisional) === "Low") {
    return [signal("geo_non_home_elevate", Math.max(0, MEDIUM_THRESHOLD - provisional), { country_code })];
  }
  if (geo.nonHomeNudge) {
    return [signal("geo_non_home_nudge", geo.nonHomeNudge, { country_code })];
  }
  return [];
}
