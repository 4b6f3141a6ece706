/**
 * Hostname classification helpers
 */

import { isIP } from 'node:net';
import * as psl from 'psl';

const DOMAIN_REGEX = /^(?:[a-zA-Z0-9_](?:[a-zA-Z0-9_-]{0,61}[a-zA-Z0-9])?\.)+[a-zA-Z]{2,}$/;

/**
 * Validate hostname syntax
 */
export function isValidDomain(domain: string): boolean {
  return DOMAIN_REGEX.test(domain);
}

export function isIpAddress(value: string): boolean {
  return isIP(value) !== 0;
}

/**
 * Lowercased, trimmed, without the trailing root dot
 */
export function normalizeHostname(hostname: string): string {
  return hostname.trim().toLowerCase().replace(/\.$/, '');
}

/**
 * True when the hostname is itself a registrable domain (example.com, example.co.uk),
 * as opposed to a host below one (www.example.com) or a bare public suffix (co.uk).
 */
export function isRootDomain(hostname: string): boolean {
  const normalized = normalizeHostname(hostname);
  if (!isValidDomain(normalized)) {
    return false;
  }
  return psl.get(normalized) === normalized;
}

/**
 * Domain part of an email address, lowercased
 */
export function emailDomain(email: string): string | null {
  const at = email.lastIndexOf('@');
  if (at < 1 || at === email.length - 1) {
    return null;
  }
  return email.slice(at + 1).toLowerCase();
}
