import { randomBytes } from 'crypto';
import { env } from '../../config/env';

type HeaderBag = Record<string, string | undefined> | undefined | null;

export function getAllowedOrigins(): string[] {
  return env.ALLOWED_ORIGINS;
}

export function corsHeaders(origin?: string): Record<string, string> {
  const headers: Record<string, string> = {
    'Access-Control-Allow-Methods': 'GET, POST, OPTIONS',
    'Access-Control-Allow-Headers': 'Content-Type, Authorization, x-correlation-id',
    'Access-Control-Allow-Credentials': 'false',
    Vary: 'Origin',
  };
  const normalized = origin?.toLowerCase().replace(/\/$/, '');
  const index = normalized ? env.ALLOWED_ORIGINS_NORMALIZED.indexOf(normalized) : -1;
  if (origin && index >= 0) {
    headers['Access-Control-Allow-Origin'] = origin;
  } else {
    headers['Access-Control-Allow-Origin'] = getAllowedOrigins()[0] ?? '*';
  }
  return headers;
}

export function originFrom(headers: HeaderBag): string | undefined {
  return headers?.origin ?? headers?.Origin;
}

export function correlationIdFrom(headers: HeaderBag): string {
  return headers?.['x-correlation-id'] || headers?.['X-Correlation-Id'] || cryptoRandomId();
}

export function cryptoRandomId(): string {
  return `corr_${randomBytes(8).toString('hex')}`;
}
