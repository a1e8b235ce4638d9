/**
 * Link selection and file naming for downloaded curriculum documents
 */

import path from 'path';

export interface PageLink {
  href: string; // as written in the page, possibly relative
  text: string;
}

export interface ResolvedLink {
  url: string;
  text: string;
}

export interface LinkCriteria {
  pattern: RegExp;
  linkText?: string;
}

const NON_DOCUMENT_SCHEMES = /^(?:javascript|mailto|tel|data):/i;

/**
 * First link, in document order, whose absolute URL matches the PDF pattern
 * or whose text contains the configured label
 */
export function selectPdfLink(links: PageLink[], pageUrl: string, criteria: LinkCriteria): ResolvedLink | null {
  const label = criteria.linkText?.toLowerCase();

  for (const link of links) {
    const href = link.href.trim();
    if (!href || href.startsWith('#') || NON_DOCUMENT_SCHEMES.test(href)) continue;

    let url: URL;
    try {
      url = new URL(href, pageUrl);
    } catch {
      continue;
    }

    const text = link.text.replace(/\s+/g, ' ').trim();
    if (criteria.pattern.test(url.href) || (label && text.toLowerCase().includes(label))) {
      return { url: url.href, text };
    }
  }
  return null;
}

/**
 * Reduce a candidate name to letters, digits, `_`, `.` and `-`, ending in `.pdf`;
 * null when nothing meaningful is left
 */
export function sanitizePdfFileName(name: string): string | null {
  const base = path.posix.basename(name.replace(/\\/g, '/'));
  const cleaned = base
    .replace(/[^\p{L}\p{N}_.-]+/gu, '_')
    .replace(/^[._-]+/, '')
    .replace(/_+$/, '');
  const stem = cleaned.replace(/\.pdf$/i, '');
  if (!/[\p{L}\p{N}]/u.test(stem)) return null;
  return `${stem}.pdf`;
}

/**
 * Filename from a Content-Disposition header, RFC 5987 form first
 */
export function fileNameFromContentDisposition(header: string | undefined): string | null {
  if (!header) return null;

  const extended = /filename\*\s*=\s*(?:[\w-]+)?'[^']*'([^;]+)/i.exec(header);
  if (extended?.[1]) {
    try {
      return decodeURIComponent(extended[1].trim().replace(/^"|"$/g, ''));
    } catch {
      // fall through to the plain form
    }
  }

  const plain = /filename\s*=\s*"([^"]+)"|filename\s*=\s*([^;]+)/i.exec(header);
  const value = plain?.[1] ?? plain?.[2];
  return value ? value.trim() : null;
}

/**
 * Last path segment of a URL, percent-decoded
 */
export function fileNameFromUrl(url: string): string | null {
  try {
    const segment = new URL(url).pathname.split('/').filter(Boolean).pop();
    return segment ? decodeURIComponent(segment) : null;
  } catch {
    return null;
  }
}

export function timestampedFileName(now: Date): string {
  return `curriculum-${now.toISOString().replace(/[:.]/g, '-')}.pdf`;
}

/**
 * `%PDF` signature check on downloaded bytes
 */
export function hasPdfSignature(data: Uint8Array): boolean {
  return Buffer.from(data.subarray(0, 4)).toString('latin1') === '%PDF';
}
