import * as dns from "dns";
import * as net from "net";

const PRIVATE_IP_RANGES = [
  /^127\./,
  /^10\./,
  /^172\.(1[6-9]|2[0-9]|3[01])\./,
  /^192\.168\./,
  /^169\.254\./,
  /^0\./,
  /^::1$/,
  /^fe80:/i,
  /^fc00:/i,
  /^fd00:/i,
];

const BLOCKED_HOSTS = ["localhost", "127.0.0.1", "0.0.0.0", "::1", "[::1]"];

const NON_NAVIGABLE_SCHEMES = /^(mailto|tel|javascript|data):/i;

const IPV4_MAPPED_DOTTED = /^::ffff:(\d{1,3}(?:\.\d{1,3}){3})$/i;
const IPV4_MAPPED_HEX = /^::ffff:([0-9a-f]{1,4}):([0-9a-f]{1,4})$/i;

/** `[::1]` → `::1`; URL.hostname keeps the brackets around IPv6 literals. */
export function stripBrackets(hostname: string): string {
  return hostname.startsWith("[") && hostname.endsWith("]") ? hostname.slice(1, -1) : hostname;
}

/**
 * IPv4-mapped IPv6 addresses reach the embedded IPv4 host. The WHATWG URL
 * parser serializes them in hex (`::ffff:7f00:1`), DNS in dotted form.
 */
export function unmapIPv4(ip: string): string {
  const dotted = IPV4_MAPPED_DOTTED.exec(ip);
  if (dotted) return dotted[1];

  const hex = IPV4_MAPPED_HEX.exec(ip);
  if (hex) {
    const high = parseInt(hex[1], 16);
    const low = parseInt(hex[2], 16);
    return [high >> 8, high & 0xff, low >> 8, low & 0xff].join(".");
  }
  return ip;
}

export function isPrivateIP(ip: string): boolean {
  const address = unmapIPv4(stripBrackets(ip));
  return PRIVATE_IP_RANGES.some((regex) => regex.test(address));
}

export function isBlockedHost(hostname: string): boolean {
  const lower = hostname.toLowerCase();
  return BLOCKED_HOSTS.includes(lower) || lower.endsWith(".local");
}

export async function resolveHostToIP(hostname: string): Promise<string[]> {
  return new Promise((resolve) => {
    dns.lookup(hostname, { all: true }, (err, addresses) => {
      if (err) {
        resolve([]);
      } else {
        resolve(addresses.map((a) => a.address));
      }
    });
  });
}

/**
 * Guards the snapshot fetch against targets on loopback or private networks.
 * Resolution failures are not treated as unsafe here; the fetch itself reports them.
 */
export async function isSSRFSafe(urlString: string): Promise<{ safe: boolean; reason?: string }> {
  let parsed: URL;
  try {
    parsed = new URL(urlString);
  } catch (e) {
    return { safe: false, reason: `Invalid URL: ${String(e)}` };
  }

  if (!["http:", "https:"].includes(parsed.protocol)) {
    return { safe: false, reason: `Blocked protocol: ${parsed.protocol}` };
  }

  const hostname = stripBrackets(parsed.hostname);

  if (isBlockedHost(hostname)) {
    return { safe: false, reason: `Blocked host: ${hostname}` };
  }

  if (net.isIP(hostname)) {
    if (isPrivateIP(hostname)) {
      return { safe: false, reason: `Private IP blocked: ${hostname}` };
    }
  } else {
    const ips = await resolveHostToIP(hostname);
    for (const ip of ips) {
      if (isPrivateIP(ip)) {
        return { safe: false, reason: `Hostname resolves to private IP: ${ip}` };
      }
    }
  }

  return { safe: true };
}

/** Accepts bare hosts such as `example.com` by assuming https. */
export function normalizeTargetUrl(input: string): string {
  const trimmed = input.trim();
  if (/^https?:\/\//i.test(trimmed)) {
    return trimmed;
  }
  return `https://${trimmed}`;
}

export function isSameHost(url1: string, url2: string): boolean {
  try {
    return new URL(url1).hostname.toLowerCase() === new URL(url2).hostname.toLowerCase();
  } catch {
    return false;
  }
}

export type LinkScope = "internal" | "external" | "ignored";

/**
 * Classifies an anchor href relative to the page it was found on.
 * Fragment-only, mailto:, tel:, javascript: and data: links are ignored.
 */
export function classifyLink(href: string, pageUrl: string): LinkScope {
  const value = href.trim();
  if (!value || value.startsWith("#") || NON_NAVIGABLE_SCHEMES.test(value)) {
    return "ignored";
  }

  let resolved: URL;
  try {
    resolved = new URL(value, pageUrl);
  } catch {
    return "ignored";
  }

  if (resolved.protocol !== "http:" && resolved.protocol !== "https:") {
    return "ignored";
  }

  return isSameHost(resolved.toString(), pageUrl) ? "internal" : "external";
}
