/**
 * Webhook telemetry sink.
 *
 * POSTs each decision event to an HTTP endpoint. Payloads are signed with
 * HMAC-SHA256 when a signing secret is configured. Delivery retries
 * network errors and 5xx responses with exponential backoff; 4xx responses
 * fail at once. A failed delivery rejects, which the emitter counts and
 * logs without surfacing to the decision path.
 */

import { createHmac } from 'crypto';
import { CompatError, configError } from '../domain/errors';
import { TelemetryEvent, TelemetrySink } from '../domain/telemetry';

/** HTTP delivery function (injectable for testing). */
export type TelemetryDeliveryFn = (
  url: string,
  event: TelemetryEvent,
  signingSecret?: string,
) => Promise<{ statusCode: number }>;

export interface WebhookSinkOptions {
  url: string;
  signingSecret?: string;
  /** Events below this severity are not sent. Defaults to 1 (everything). */
  minSeverity?: number;
  deliveryFn?: TelemetryDeliveryFn;
}

/**
 * Check that a sink URL is safe to send requests to.
 * Returns an error message, or null when the URL is acceptable.
 *
 * Blocks non-HTTP(S) protocols, localhost, cloud metadata hosts and the
 * private, link-local and unspecified IPv4 ranges.
 */
export function validateSinkUrl(url: string): string | null {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return `Invalid sink URL: ${url}`;
  }

  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    return `Sink URL must use http or https protocol, got: ${parsed.protocol}`;
  }

  const hostname = parsed.hostname.toLowerCase();

  if (hostname === 'localhost' || hostname === '127.0.0.1' || hostname === '::1' || hostname === '[::1]') {
    return `Sink URL must not point to localhost: ${hostname}`;
  }

  if (hostname === '169.254.169.254' || hostname === 'metadata.google.internal') {
    return `Sink URL must not point to cloud metadata endpoints: ${hostname}`;
  }

  const ipv4Match = hostname.match(/^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})$/);
  if (ipv4Match) {
    const a = Number(ipv4Match[1]);
    const b = Number(ipv4Match[2]);
    if (a === 10) return `Sink URL must not point to private IP range: ${hostname}`;
    if (a === 172 && b >= 16 && b <= 31) return `Sink URL must not point to private IP range: ${hostname}`;
    if (a === 192 && b === 168) return `Sink URL must not point to private IP range: ${hostname}`;
    if (a === 169 && b === 254) return `Sink URL must not point to link-local range: ${hostname}`;
    if (a === 0) return `Sink URL must not point to unspecified address: ${hostname}`;
  }

  return null;
}

/** Hex HMAC-SHA256 signature sent in X-Telemetry-Signature. */
export function signPayload(body: string, secret: string): string {
  return `sha256=${createHmac('sha256', secret).update(body).digest('hex')}`;
}

const MAX_RETRIES = 3;
const BACKOFF_BASE_MS = 1000;
const REQUEST_TIMEOUT_MS = 10_000;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

const httpDelivery: TelemetryDeliveryFn = async (url, event, signingSecret) => {
  const body = JSON.stringify(event);
  const headers: Record<string, string> = {
    'Content-Type': 'application/json',
    'User-Agent': 'semverx-gate-telemetry/0.1.0',
    'X-Telemetry-Event-Id': event.id,
    'X-Telemetry-Trace-Id': event.traceId,
    'X-Telemetry-Kind': event.kind,
  };
  if (signingSecret) {
    headers['X-Telemetry-Signature'] = signPayload(body, signingSecret);
  }

  let lastError: Error | undefined;

  for (let attempt = 0; attempt <= MAX_RETRIES; attempt++) {
    if (attempt > 0) {
      await sleep(BACKOFF_BASE_MS * Math.pow(2, attempt - 1));
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), REQUEST_TIMEOUT_MS);

    try {
      const response = await fetch(url, { method: 'POST', headers, body, signal: controller.signal });
      clearTimeout(timeout);
      if (response.status < 500) {
        return { statusCode: response.status };
      }
      lastError = new Error(`Telemetry sink returned HTTP ${response.status}`);
    } catch (err) {
      clearTimeout(timeout);
      lastError = err instanceof Error ? err : new Error('Unknown telemetry delivery error');
    }
  }

  throw lastError ?? new Error('Telemetry delivery failed after retries');
};

export class WebhookTelemetrySink implements TelemetrySink {
  private readonly url: string;
  private readonly signingSecret?: string;
  private readonly minSeverity: number;
  private readonly deliveryFn: TelemetryDeliveryFn;

  constructor(options: WebhookSinkOptions) {
    const urlError = validateSinkUrl(options.url);
    if (urlError) {
      throw new CompatError(configError([urlError]));
    }
    this.url = options.url;
    this.signingSecret = options.signingSecret;
    this.minSeverity = options.minSeverity ?? 1;
    this.deliveryFn = options.deliveryFn ?? httpDelivery;
  }

  async deliver(event: TelemetryEvent): Promise<void> {
    if (event.severity < this.minSeverity) return;
    const response = await this.deliveryFn(this.url, event, this.signingSecret);
    if (response.statusCode < 200 || response.statusCode >= 300) {
      throw new Error(`Telemetry sink rejected event ${event.id} with HTTP ${response.statusCode}`);
    }
  }
}
