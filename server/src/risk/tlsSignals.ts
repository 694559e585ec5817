import type { Signal } from "../types/diagnostics";
import { type ScoringContext, signal } from "./core";

export function tlsSignalsModule(ctx: ScoringContext): Signal[] {
  const weights = ctx.config.tls;
  const cert = ctx.input.certificate;
  const signals: Signal[] = [];

  if (!cert.tls_valid) {
    signals.push(signal("tls_invalid_or_absent", weights.invalidOrAbsent));
  } else if (!cert.is_lets_encrypt) {
    // A valid free-CA certificate is scored below instead.
    signals.push(signal("tls_valid_non_lets_encrypt", weights.validNonFreeCa));
  }

  if (cert.is_self_signed) {
    signals.push(signal("self_signed", weights.selfSigned));
  }

  if (cert.is_lets_encrypt) {
    const young = ctx.ageDays !== undefined && ctx.ageDays < weights.youngDomainDays;
    const impact = weights.freeCa + (young ? weights.freeCaYoungDomainBonus : 0);
    signals.push(signal("lets_encrypt", impact, { issuer: cert.issuer_summary }));
  }

  return signals;
}
