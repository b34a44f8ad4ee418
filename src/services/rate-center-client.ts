/**
 * NPA-NXX prefix lookup client
 * Queries the public prefix service for the rate center and LATA of a prefix
 */

import { logger } from '../utils/logger.js';
import { RateCenterLookupError } from '../utils/error-handler.js';
import type { RateCenterInfo, RateCenterLookup } from '../types/order-form.js';

export interface RateCenterClientConfig {
  serviceUrl: string;
  timeout?: number;
}

const DEFAULT_TIMEOUT_MS = 10_000;

const XML_ENTITIES: Record<string, string> = {
  '&amp;': '&',
  '&lt;': '<',
  '&gt;': '>',
  '&quot;': '"',
  '&apos;': "'",
};

/**
 * Text of the first <tag> element, entities decoded
 */
export function extractXmlElement(xml: string, tag: string): string | undefined {
  const match = xml.match(new RegExp(`<${tag}(?:\\s[^>]*)?>([^<]*)</${tag}>`, 'i'));
  if (!match) return undefined;

  const text = match[1]
    .replace(/&(amp|lt|gt|quot|apos);/g, (entity) => XML_ENTITIES[entity] ?? entity)
    .trim();
  return text || undefined;
}

/**
 * Rate center and LATA of a prefix. A missing LATA is kept as "" so the rate
 * center still resolves; without a rate center the prefix is unknown.
 */
export function parsePrefixResponse(xml: string): RateCenterInfo | null {
  const rateCenter = extractXmlElement(xml, 'rc');
  if (!rateCenter) return null;
  return { rateCenter, lata: extractXmlElement(xml, 'lata') ?? '' };
}

export class HttpRateCenterLookup implements RateCenterLookup {
  private readonly serviceUrl: string;
  private readonly timeout: number;

  constructor(clientConfig: RateCenterClientConfig) {
    this.serviceUrl = clientConfig.serviceUrl;
    this.timeout = clientConfig.timeout || DEFAULT_TIMEOUT_MS;
  }

  /**
   * Best effort: every failure is logged and reported as null
   */
  async lookup(npa: string, nxx: string): Promise<RateCenterInfo | null> {
    try {
      const xml = await this.request(npa, nxx);
      const info = parsePrefixResponse(xml);
      if (!info) {
        logger.warn('Prefix response had no rate center', { npa, nxx });
      }
      return info;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.warn('Rate center lookup failed', { npa, nxx, error: message });
      return null;
    }
  }

  private async request(npa: string, nxx: string): Promise<string> {
    const params = new URLSearchParams({ npa, nxx });
    const url = `${this.serviceUrl}?${params.toString()}`;

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      logger.debug(`GET ${url}`);

      const response = await fetch(url, {
        method: 'GET',
        headers: { Accept: 'application/xml, text/xml' },
        signal: controller.signal,
      });

      if (!response.ok) {
        throw new RateCenterLookupError(`HTTP ${response.status}: ${response.statusText}`, {
          status: response.status,
          npa,
          nxx,
        });
      }

      return await response.text();
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new RateCenterLookupError(`Request timeout after ${this.timeout}ms`, { npa, nxx });
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
