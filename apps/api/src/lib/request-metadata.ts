import type { Context } from 'hono';
import { getConnInfo } from '@hono/node-server/conninfo';
import { isIP } from 'node:net';
import type { RequestContext, RequestMetadata } from '@latchkey/core';

function normalizeIp(value?: string | null): string | null {
  if (!value) {
    return null;
  }
  const trimmed = value.trim();
  return trimmed && isIP(trimmed) ? trimmed : null;
}

function getRemoteAddress(c: Context): string | null {
  try {
    return normalizeIp(getConnInfo(c).remote.address);
  } catch {
    // No socket outside the node-server runtime (app.request in tests)
    return null;
  }
}

function getHeaderIp(c: Context): string | null {
  const realIp = normalizeIp(c.req.header('x-real-ip'));
  if (realIp) {
    return realIp;
  }

  // First entry is the one closest to the client
  const firstIp = c.req.header('x-forwarded-for')?.split(',')[0];
  return normalizeIp(firstIp);
}

/**
 * The client address. Forwarded headers are only believed behind a proxy
 * the operator vouched for with TRUST_PROXY.
 */
export function resolveClientIp(c: Context, trustProxy: boolean): string | null {
  if (trustProxy) {
    return getHeaderIp(c) ?? getRemoteAddress(c);
  }
  return getRemoteAddress(c);
}

export function requestMetadata(c: Context, trustProxy: boolean): RequestMetadata {
  return {
    userAgent: c.req.header('user-agent') ?? null,
    ipAddress: resolveClientIp(c, trustProxy),
  };
}

export function toRequestContext(metadata: RequestMetadata): RequestContext {
  return { ip: metadata.ipAddress, userAgent: metadata.userAgent };
}
