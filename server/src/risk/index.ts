import type { RiskAssessment, Signal } from "../types/diagnostics";
import { type RiskModule, type ScoringInput, clampScore, getRiskLabel, parseScoringContext } from "./core";
import { domainAgeModule } from "./domainAge";
import { geoSignalsModule } from "./geoSignals";
import { reputationSignalsModule } from "./reputationSignals";
import { tlsSignalsModule } from "./tlsSignals";
import { type ScoringConfig, defaultScoringConfig } from "./weights";

// Order is part of the algorithm: the geography rule reads the running score.
const riskModules: RiskModule[] = [domainAgeModule, tlsSignalsModule, geoSignalsModule, reputationSignalsModule];

export function evaluateRisk(
  input: ScoringInput,
  options?: { config?: ScoringConfig; now?: Date }
): RiskAssessment {
  const ctx = parseScoringContext(input, options?.config ?? defaultScoringConfig, options?.now ?? new Date());

  let running = 0;
  const signals: Signal[] = [];
  for (const riskModule of riskModules) {
    for (const item of riskModule(ctx, running)) {
      running += item.impact;
      signals.push(item);
    }
  }

  const score = clampScore(running);
  return { score, label: getRiskLabel(score), signals };
}

export type { ProbedIp, ReputationFindings, ScoringInput } from "./core";
