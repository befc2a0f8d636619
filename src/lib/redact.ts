import type { Attributes } from '@opentelemetry/api';
import type { ExportResult } from '@opentelemetry/core';
import type { ReadableSpan, SpanExporter } from '@opentelemetry/sdk-trace-base';
import { createLogger } from './log.js';

const log = createLogger('otel');

export function sanitizeString(input: string): string {
  let out = input;

  // Bearer credentials in any header-like string.
  out = out.replace(/Bearer\s+[^\s,;]+/gi, 'Bearer <token>');

  // Generic JWT pattern (base64url.header.base64url.payload.base64url.signature).
  out = out.replace(/\b[A-Za-z0-9_-]{8,}\.[A-Za-z0-9_-]{8,}\.[A-Za-z0-9_-]{8,}\b/g, '<jwt>');

  // Workspace personal access tokens.
  out = out.replace(/\bdapi[a-f0-9]{32}\b/gi, '<token>');

  // Email addresses (PII).
  out = out.replace(/[A-Z0-9._%+-]+@[A-Z0-9.-]+\.[A-Z]{2,}/gi, '<email>');

  // Opaque IDs (hex, base64url-ish, long random strings).
  out = out.replace(/[a-f0-9]{32,}/gi, '<id>');
  out = out.replace(/[A-Za-z0-9_-]{40,}/g, '<id>');

  // Drop query strings.
  out = out.replace(/\?.*$/, '?<redacted>');

  return out;
}

const SENSITIVE_KEYS = [
  'authorization',
  'cookie',
  'set-cookie',
  'x-api-key',
  'x-forwarded-access-token',
  'password',
  'db.connection_string',
];

export function isSensitiveAttribute(key: string): boolean {
  const lk = key.toLowerCase();
  return SENSITIVE_KEYS.some((s) => lk.includes(s));
}

/** Drop credential-bearing attributes and scrub the rest in place. */
export function redactAttributes(attrs: Attributes): void {
  for (const [k, v] of Object.entries(attrs)) {
    if (isSensitiveAttribute(k)) {
      delete attrs[k];
      continue;
    }
    if (typeof v === 'string') {
      attrs[k] = sanitizeString(v);
    }
  }
}

export class RedactingSpanExporter implements SpanExporter {
  constructor(private readonly inner: SpanExporter) {}

  export(spans: ReadableSpan[], resultCallback: (result: ExportResult) => void): void {
    for (const span of spans) {
      try {
        redactAttributes(span.attributes);
      } catch (err) {
        // Redaction must never block exports.
        log.debug('span_sanitize_failed', { error: err instanceof Error ? err.message : String(err) });
      }
    }
    this.inner.export(spans, resultCallback);
  }

  async shutdown(): Promise<void> {
    await this.inner.shutdown();
  }

  async forceFlush(): Promise<void> {
    await this.inner.forceFlush?.();
  }
}
