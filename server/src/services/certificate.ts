import { isIP } from "node:net";
import tls, { type PeerCertificate } from "node:tls";
import { describeError } from "../lib/errors";
import { parseCertificateDate } from "../lib/timestamps";
import type { CertificateSummary } from "../types/diagnostics";

export const FREE_CA_MARKER = "Let's Encrypt";

export type HandshakeOptions = {
  host: string;
  port: number;
  verify: boolean;
  timeoutMs: number;
  signal?: AbortSignal;
};

export type TlsHandshake = (options: HandshakeOptions) => Promise<PeerCertificate>;

export type CertificateProbe = {
  summary: CertificateSummary;
  failures: string[];
};

type NameAttributes = Record<string, string | string[] | undefined>;

export const tlsHandshake: TlsHandshake = ({ host, port, verify, timeoutMs, signal }) =>
  new Promise((resolve, reject) => {
    signal?.throwIfAborted();
    // SNI carries host names only.
    const socket = tls.connect({ host, port, servername: isIP(host) ? undefined : host, rejectUnauthorized: verify });
    const onAbort = () => socket.destroy(new Error(`TLS handshake with ${host}:${port} aborted`));
    signal?.addEventListener("abort", onAbort, { once: true });
    socket.once("close", () => signal?.removeEventListener("abort", onAbort));

    socket.setTimeout(timeoutMs, () => {
      socket.destroy(new Error(`TLS handshake with ${host}:${port} timed out after ${timeoutMs}ms`));
    });
    socket.on("error", reject);
    socket.once("secureConnect", () => {
      const cert = socket.getPeerCertificate();
      socket.destroy();
      if (Object.keys(cert).length === 0) {
        reject(new Error(`${host}:${port} presented no certificate`));
        return;
      }
      resolve(cert);
    });
  });

function attribute(name: NameAttributes, key: string): string | null {
  const value = name[key];
  const text = Array.isArray(value) ? value.join(", ") : value;
  return text ? text : null;
}

function sameName(a: NameAttributes, b: NameAttributes): boolean {
  const entries = (name: NameAttributes) =>
    Object.entries(name)
      .filter(([, value]) => value !== undefined && value !== "")
      .map(([key, value]) => `${key}=${Array.isArray(value) ? value.join("+") : value}`)
      .sort();
  const left = entries(a);
  const right = entries(b);
  return left.length > 0 && left.length === right.length && left.every((entry, index) => entry === right[index]);
}

export function emptyCertificate(): CertificateSummary {
  return {
    tls_valid: false,
    issuer_country: null,
    issuer_org: null,
    issuer_common_name: null,
    issuer_summary: null,
    not_after: null,
    is_self_signed: false,
    is_lets_encrypt: false
  };
}

export function parseCertificate(cert: PeerCertificate, tlsValid: boolean): CertificateSummary {
  const issuer: NameAttributes = { ...cert.issuer };
  const subject: NameAttributes = { ...cert.subject };
  const issuer_country = attribute(issuer, "C");
  const issuer_org = attribute(issuer, "O");
  const issuer_common_name = attribute(issuer, "CN");
  const issuer_summary = issuer_common_name ?? issuer_org;

  return {
    tls_valid: tlsValid,
    issuer_country,
    issuer_org,
    issuer_common_name,
    issuer_summary,
    not_after: cert.valid_to ? parseCertificateDate(cert.valid_to) : null,
    is_self_signed: sameName(subject, issuer),
    is_lets_encrypt: [issuer_common_name, issuer_org].some((value) => value?.includes(FREE_CA_MARKER) ?? false)
  };
}

async function attemptHandshake(
  handshake: TlsHandshake,
  options: HandshakeOptions
): Promise<{ cert?: PeerCertificate; error?: string }> {
  try {
    return { cert: await handshake(options) };
  } catch (err) {
    return { error: `${options.verify ? "verified" : "unverified"} handshake failed: ${describeError(err)}` };
  }
}

/**
 * Connects with chain verification first. When that fails the certificate is
 * fetched again without verification so issuer details survive on invalid TLS.
 */
export async function probeCertificate(
  host: string,
  opts: { timeoutMs: number; handshake?: TlsHandshake; port?: number; signal?: AbortSignal }
): Promise<CertificateProbe> {
  const handshake = opts.handshake ?? tlsHandshake;
  const base = { host, port: opts.port ?? 443, timeoutMs: opts.timeoutMs, signal: opts.signal };

  const verified = await attemptHandshake(handshake, { ...base, verify: true });
  if (verified.cert) return { summary: parseCertificate(verified.cert, true), failures: [] };

  const unverified = await attemptHandshake(handshake, { ...base, verify: false });
  const failures = [verified.error, unverified.error].filter((item): item is string => item !== undefined);
  if (unverified.cert) return { summary: parseCertificate(unverified.cert, false), failures };
  return { summary: emptyCertificate(), failures };
}
