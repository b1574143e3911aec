import { z } from 'zod';
import { fail, ok, type Result } from '../utils/errors.js';
import type { ProfileLocator } from './types.js';

const ALLOWED_HOSTS = new Set(['tiktok.com', 'www.tiktok.com', 'm.tiktok.com', 'vm.tiktok.com']);

interface HandleRule {
  pattern: RegExp;
  canonical: (handle: string) => string;
}

const profileUrl = (handle: string) => `https://www.tiktok.com/@${handle}`;

// Tried in order against host + path.
const HANDLE_RULES: HandleRule[] = [
  { pattern: /^(?:www\.|m\.)?tiktok\.com\/@([^/?#]+)/,      canonical: profileUrl },
  { pattern: /^(?:www\.|m\.)?tiktok\.com\/user\/([^/?#]+)/, canonical: profileUrl },
  { pattern: /^vm\.tiktok\.com\/([^/?#]+)/,                 canonical: (code) => `https://vm.tiktok.com/${code}` },
  { pattern: /^(?:www\.|m\.)?tiktok\.com\/([^/@?#]+)\/?$/,  canonical: profileUrl },
];

const UrlSchema = z.string().url('Profile URL is not a valid URL');

/**
 * Validate a profile URL and pull out the account handle. The scheme may be
 * omitted; `https://` is assumed. Links into a profile (a video page, a
 * trailing slash, a query string) resolve to the profile itself.
 */
export function parseProfileLocator(raw: string): Result<ProfileLocator, string> {
  const trimmed = raw.trim();
  if (!trimmed) return fail('Profile URL is empty');
  const candidate = /^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;

  const parsed = UrlSchema.safeParse(candidate);
  if (!parsed.success) return fail(parsed.error.issues[0]?.message ?? 'Invalid profile URL');

  const url = new URL(parsed.data);
  if (url.protocol !== 'https:' && url.protocol !== 'http:') {
    return fail(`Unsupported URL scheme "${url.protocol}"`);
  }

  const host = url.hostname.toLowerCase();
  if (!ALLOWED_HOSTS.has(host)) {
    return fail(`"${host}" is not a TikTok address; use a URL like https://www.tiktok.com/@name`);
  }

  const target = `${host}${url.pathname}`;
  for (const { pattern, canonical } of HANDLE_RULES) {
    const handle = pattern.exec(target)?.[1];
    if (handle) return ok({ url: canonical(handle), handle });
  }
  return fail('Could not find a profile name in the URL; use https://www.tiktok.com/@name');
}
