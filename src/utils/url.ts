import { UrlInvalidError } from "./errors";

/**
 * Normalize a host or URL to `scheme://host[:port][/path]`, defaulting the
 * scheme to https. A trailing slash is dropped.
 *
 *   generateProperUrl("cucm-pub", 8443)   // "https://cucm-pub:8443"
 */
export function generateProperUrl(url: string, port?: number | string): string {
  const trimmed = url.trim();
  const withScheme = /^https?:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;

  let parsed: URL;
  try {
    parsed = new URL(withScheme);
  } catch {
    throw new UrlInvalidError(url);
  }
  if (!parsed.hostname) throw new UrlInvalidError(url);
  if (port !== undefined && String(port) !== "" && String(port) !== "0") {
    parsed.port = String(port);
  }

  const pathname = parsed.pathname.replace(/\/+$/, "");
  return `${parsed.protocol}//${parsed.host}${pathname}`;
}

/** `joinUrl("https://h:8443", "axl/")` → `https://h:8443/axl/` */
export function joinUrl(base: string, suffix: string): string {
  return `${base.replace(/\/+$/, "")}/${suffix.replace(/^\/+/, "")}`;
}
