/**
 * Shipment identity helpers
 */

import { randomUUID } from 'crypto';

/**
 * Comparison form of an identity key: trimmed, inner whitespace collapsed,
 * upper-cased. Returns null for blank input.
 */
export function normalizeIdentity(value: unknown): string | null {
    if (value === null || value === undefined) return null;
    const text = String(value).trim().split(/\s+/).join(' ').toUpperCase();
    return text || null;
}

export function identitiesMatch(a: unknown, b: unknown): boolean {
    const left = normalizeIdentity(a);
    return left !== null && left === normalizeIdentity(b);
}

/**
 * Identity for a record the sync job originates (no spreadsheet row yet).
 * UNKNOWN-<order name, non-alphanumerics collapsed to '-', max 32 chars>-<6 hex>
 */
export function generateFallbackShipmentNo(orderName: string): string {
    const sanitized = orderName
        .replace(/[^A-Za-z0-9]+/g, '-')
        .replace(/^-+|-+$/g, '') || 'order';
    const suffix = randomUUID().replace(/-/g, '').slice(0, 6);
    return `UNKNOWN-${sanitized.slice(0, 32)}-${suffix}`;
}
