// ── Target URL handling ──────────────────────────────────────

/** Prepend `https://` when the user passed a bare host. */
export function normalizeTargetUrl(raw: string): string {
  const trimmed = raw.trim();
  return /^https?:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;
}

/**
 * Base URL deep links hang off: everything before `loginPathMarker`
 * when present, otherwise the URL itself, without a trailing slash.
 */
export function consoleBaseUrl(targetUrl: string, loginPathMarker?: string): string {
  let base = targetUrl;
  if (loginPathMarker !== undefined) {
    const at = base.indexOf(loginPathMarker);
    if (at !== -1) base = base.slice(0, at);
  }
  return base.replace(/\/+$/, '');
}

export function deepLinkUrl(baseUrl: string, link: string): string {
  return link.startsWith('/') ? `${baseUrl}${link}` : `${baseUrl}/${link}`;
}
