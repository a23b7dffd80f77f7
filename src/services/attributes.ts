// src/services/attributes.ts
import type { ErpAttribute, ErpRef } from '../types.js';

type KV = Record<string, unknown>;

/** Custom ERP attributes as a name -> value map (first occurrence wins). */
export function extractAttributes(attrs: ErpAttribute[] | undefined): KV {
  const out: KV = {};
  for (const a of attrs || []) {
    const name = a.name.trim();
    if (name && !(name in out)) out[name] = a.value;
  }
  return out;
}

/** Case-insensitive lookup over candidate names; first non-empty value wins. */
export function findFirstKey(obj: KV, candidates: readonly string[]): string | undefined {
  if (!candidates.length) return undefined;
  const lowerToReal: Record<string, string> = {};
  for (const k of Object.keys(obj)) lowerToReal[k.toLocaleLowerCase()] = k;
  for (const cand of candidates) {
    const real = lowerToReal[cand.toLocaleLowerCase()];
    if (real === undefined) continue;
    const text = stringify(obj[real]);
    if (text) return text;
  }
  return undefined;
}

/** First candidate that is a non-blank string. */
export function firstPresent(...candidates: Array<string | null | undefined>): string | undefined {
  for (const c of candidates) {
    if (typeof c === 'string' && c.trim()) return c;
  }
  return undefined;
}

/** Reference fields may be inline strings or expanded entities. */
export function refName(value: string | ErpRef | undefined): string | undefined {
  if (typeof value === 'string') return value || undefined;
  return value?.name || undefined;
}

function stringify(value: unknown): string | undefined {
  if (value == null) return undefined;
  if (typeof value === 'string') return value.trim() || undefined;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  // custom-entity attributes carry { name, meta }
  if (typeof value === 'object' && 'name' in value && typeof value.name === 'string') {
    return value.name.trim() || undefined;
  }
  return undefined;
}

/** Candidate attribute names per field, Russian storefront labels first. */
export const ATTRIBUTE_NAMES = {
  recipient: ['получатель', 'recipient'],
  phone: ['телефон', 'phone'],
  email: ['email', 'e-mail', 'почта'],
  deliveryMethod: ['способ доставки', 'delivery method'],
  comment: ['комментарий', 'comment'],
  deliveryLink: ['ссылка на доставку', 'delivery link'],
  trackNumber: ['трек-номер', 'трек номер', 'tracking number'],
} as const;
