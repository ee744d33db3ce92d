/**
 * Strip Binary Data Utility
 *
 * Replaces embedded base64 blobs in backend JSON with a short placeholder
 * before a tool result is shown to the reasoning model.
 */

import type { JsonValue } from '../tools/types.js';

// Fields backends use for inline file content
const BINARY_FIELD_NAMES = new Set(['data_base64', 'pdf_base64', 'file_base64', 'base64', 'dataUrl']);

const MIN_BASE64_LENGTH = 1000;

function isDataUrl(value: string): boolean {
  return value.startsWith('data:') && value.includes('base64,');
}

function looksLikeBase64(value: string): boolean {
  if (value.length < MIN_BASE64_LENGTH) return false;
  return /^[A-Za-z0-9+/]+=*$/.test(value.substring(0, 100));
}

function placeholder(value: string): string {
  return `[Binary data: ${Math.round(value.length / 1024)}KB - delivered to user]`;
}

export function stripBinaryData(value: JsonValue): JsonValue {
  if (typeof value === 'string') {
    return isDataUrl(value) || looksLikeBase64(value) ? placeholder(value) : value;
  }

  if (Array.isArray(value)) {
    return value.map(stripBinaryData);
  }

  if (value !== null && typeof value === 'object') {
    const cleaned: { [key: string]: JsonValue } = {};
    for (const [key, inner] of Object.entries(value)) {
      if (BINARY_FIELD_NAMES.has(key) && typeof inner === 'string' && inner.length >= MIN_BASE64_LENGTH) {
        cleaned[key] = placeholder(inner);
        continue;
      }
      cleaned[key] = stripBinaryData(inner);
    }
    return cleaned;
  }

  return value;
}
