// lib/porssisahko.ts
// api.porssisahko.net client

import type { PricePayload, PriceRecord } from './types';

export type Fetcher = (url: string, init?: { signal?: AbortSignal }) => Promise<Response>;

export type FetchedPrices = {
  body: string;           // response body as received, cached verbatim
  payload: PricePayload;
};

const TIMEOUT_MS = 30000;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

export function isPricePayload(value: unknown): value is PricePayload {
  if (!isRecord(value) || !Array.isArray(value.prices)) return false;
  return value.prices.every(
    (p: unknown) =>
      isRecord(p) &&
      typeof p.price === 'number' &&
      Number.isFinite(p.price) &&
      typeof p.startDate === 'string' &&
      !Number.isNaN(new Date(p.startDate).getTime())
  );
}

export function parsePricePayload(body: string): PricePayload {
  const json: unknown = JSON.parse(body);
  if (!isPricePayload(json)) {
    throw new Error('Price data has an unexpected shape (expected { prices: [{ price, startDate }] })');
  }
  return json;
}

export function toPriceRecords(payload: PricePayload): PriceRecord[] {
  return payload.prices.map((p) => ({
    start: new Date(p.startDate),
    price: p.price,
  }));
}

export async function fetchLatestPrices(
  url: string,
  fetcher: Fetcher = fetch
): Promise<FetchedPrices> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), TIMEOUT_MS);

  try {
    const startTime = Date.now();
    const resp = await fetcher(url, { signal: controller.signal });
    console.log(`${url} fetched (${resp.status}, ${Date.now() - startTime}ms)`);

    if (!resp.ok) {
      throw new Error(`Fetching ${url} failed (${resp.status})`);
    }

    const body = await resp.text();
    return { body, payload: parsePricePayload(body) };
  } finally {
    clearTimeout(timeoutId);
  }
}
