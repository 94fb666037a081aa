import type { FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import { AuthError, TenantError } from '../../common/errors.js';
import { ACTOR_ROLES, type ActorContext, type ActorRole } from '../../common/types.js';

declare module 'fastify' {
  interface FastifyRequest {
    actor?: ActorContext;
  }
}

const actorRoleSchema = z.enum(ACTOR_ROLES);

/** Tenant ids name per-tenant database files, so they stay within a safe alphabet. */
export const tenantIdSchema = z.string().regex(/^[A-Za-z0-9_-]{1,64}$/);

function headerValue(value: string | string[] | undefined): string | undefined {
  const raw = Array.isArray(value) ? value[0] : value;
  const trimmed = raw?.trim();
  return trimmed ? trimmed : undefined;
}

export function parseActorRoles(value: string | string[] | undefined): ActorRole[] {
  if (!value) {
    return [];
  }
  const raw = Array.isArray(value) ? value.flatMap(entry => entry.split(',')) : value.split(',');
  const normalized: ActorRole[] = [];
  for (const entry of raw) {
    const candidate = actorRoleSchema.safeParse(entry.trim().toUpperCase());
    if (candidate.success && !normalized.includes(candidate.data)) {
      normalized.push(candidate.data);
    }
  }
  return normalized;
}

/**
 * Builds the request's actor from the `x-tenant-id`, `x-actor-id` and
 * `x-actor-roles` headers. Identity is asserted by an upstream gateway.
 */
export async function registerAuth(req: FastifyRequest, reply: FastifyReply) {
  const tenantId = headerValue(req.headers['x-tenant-id']);
  if (!tenantId) {
    reply.code(400);
    throw new TenantError('Missing x-tenant-id header');
  }
  if (!tenantIdSchema.safeParse(tenantId).success) {
    reply.code(400);
    throw new TenantError('Invalid x-tenant-id header');
  }
  const actorId = headerValue(req.headers['x-actor-id']);
  if (!actorId) {
    reply.code(401);
    throw new AuthError('Missing x-actor-id header');
  }
  const roles = parseActorRoles(req.headers['x-actor-roles']);
  if (roles.length === 0) {
    reply.code(401);
    throw new AuthError('Missing or unknown x-actor-roles header');
  }
  req.actor = { tenantId, actorId, roles };
}

export function actorOf(req: FastifyRequest): ActorContext {
  if (!req.actor) {
    throw new AuthError('Request has no authenticated actor');
  }
  return req.actor;
}
