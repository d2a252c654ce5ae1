import * as net from "net";
import * as tls from "tls";
import type { CertificateInfo } from "./types";
import { SubCheckError, errorMessage } from "./errors";
import { stripBrackets } from "./url-utils";

export type TlsCheckResult =
  | { status: "valid"; certificate: CertificateInfo }
  | { status: "failed"; reason: string }
  | { status: "skipped" };

export type TlsProbe = (host: string, timeoutMs: number) => Promise<CertificateInfo>;

const NAME_FIELDS = ["CN", "O", "OU", "C"] as const;

function distinguishedName(name: tls.Certificate | undefined): string {
  if (!name) return "";
  const parts: string[] = [];
  for (const field of NAME_FIELDS) {
    const value = name[field];
    if (value) parts.push(`${field}=${String(value)}`);
  }
  return parts.join(", ");
}

export interface TlsTarget {
  host: string;
  servername?: string;
}

/** SNI carries host names only, so IP literals connect without one. */
export function tlsTarget(hostname: string): TlsTarget {
  const host = stripBrackets(hostname);
  return net.isIP(host) ? { host } : { host, servername: host };
}

export interface CertificateProbeOptions {
  port?: number;
}

/**
 * Builds a probe that opens a verified TLS connection and reads the peer
 * certificate. Rejects on DNS failure, handshake failure, an unverifiable chain
 * or when `timeoutMs` elapses, counted from the connect call.
 */
export function createCertificateProbe(options: CertificateProbeOptions = {}): TlsProbe {
  const port = options.port ?? 443;

  return (hostname, timeoutMs) =>
    new Promise<CertificateInfo>((resolve, reject) => {
      const socket = tls.connect({ ...tlsTarget(hostname), port });
      let settled = false;

      const finish = (error: Error | null, certificate?: CertificateInfo): void => {
        if (settled) return;
        settled = true;
        clearTimeout(deadline);
        socket.removeAllListeners();
        socket.on("error", () => undefined);
        socket.destroy();
        if (error) {
          reject(error);
        } else if (certificate) {
          resolve(certificate);
        }
      };

      const deadline = setTimeout(() => {
        finish(new SubCheckError("tls", `TLS handshake timed out after ${timeoutMs}ms`));
      }, timeoutMs);

      socket.once("secureConnect", () => {
        const peer = socket.getPeerCertificate();
        if (!peer || Object.keys(peer).length === 0) {
          finish(new SubCheckError("tls", "no peer certificate presented"));
          return;
        }
        finish(null, {
          subject: distinguishedName(peer.subject),
          issuer: distinguishedName(peer.issuer),
          validFrom: peer.valid_from,
          validTo: peer.valid_to,
        });
      });

      socket.once("close", () => {
        finish(new SubCheckError("tls", "connection closed before the handshake completed"));
      });

      socket.once("error", (error) => finish(error));
    });
}

export const probeCertificate: TlsProbe = createCertificateProbe();

/** Runs the probe and folds every failure into a result value. */
export async function checkTls(
  snapshot: { scheme: string; domain: string },
  timeoutMs: number,
  probe: TlsProbe = probeCertificate
): Promise<TlsCheckResult> {
  if (snapshot.scheme !== "https") {
    return { status: "skipped" };
  }

  try {
    const certificate = await probe(snapshot.domain, timeoutMs);
    return { status: "valid", certificate };
  } catch (error) {
    return { status: "failed", reason: errorMessage(error) };
  }
}
