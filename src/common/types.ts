export interface TenantScoped { tenantId: string; }

export interface BaseEntity extends TenantScoped { id: string; createdAt: string; updatedAt: string; }

export const ACTOR_ROLES = ['ADMIN', 'TEACHER', 'STUDENT'] as const;

export type ActorRole = (typeof ACTOR_ROLES)[number];

export interface ActorContext {
	tenantId: string;
	actorId: string;
	roles: ActorRole[];
}

export interface DomainEvent<TType extends string = string, TPayload = unknown> {
	id: string;
	type: TType;
	occurredAt: string;
	tenantId: string;
	payload: TPayload;
}

/**
 * Source of wall-clock time. Every deadline decision reads from an injected clock
 * so that timeouts can be exercised without waiting.
 */
export interface Clock {
	now(): Date;
}

export const systemClock: Clock = { now: () => new Date() };
