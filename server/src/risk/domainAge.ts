import type { Signal } from "../types/diagnostics";
import { type ScoringContext, signal } from "./core";

export function domainAgeModule(ctx: ScoringContext): Signal[] {
  const weights = ctx.config.domainAge;
  const age_days = ctx.ageDays;

  if (age_days === undefined) {
    return [signal("missing_creation_date", weights.missing)];
  }
  if (age_days < 7) return [signal("age_<7d", weights.underWeek, { age_days })];
  if (age_days < 90) return [signal("age_7d_to_3m", weights.underThreeMonths, { age_days })];
  if (age_days < 180) return [signal("age_3m_to_6m", weights.underSixMonths, { age_days })];
  if (age_days < 365) return [signal("age_6m_to_12m", weights.underYear, { age_days })];
  return [signal("age_>12m", weights.established, { age_days })];
}
