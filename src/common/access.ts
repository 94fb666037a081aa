import { PermissionDeniedError } from './errors.js';
import type { ActorContext, ActorRole } from './types.js';

export function hasRole(actor: ActorContext, ...roles: ActorRole[]): boolean {
	return actor.roles.some(role => roles.includes(role));
}

export function requireRole(actor: ActorContext, ...roles: ActorRole[]): void {
	if (!hasRole(actor, ...roles)) {
		throw new PermissionDeniedError(`Requires one of roles: ${roles.join(', ')}`);
	}
}

/** Admins manage everything; teachers manage what they created. */
export function canManage(actor: ActorContext, resource: { createdBy: string }): boolean {
	if (hasRole(actor, 'ADMIN')) {
		return true;
	}
	return hasRole(actor, 'TEACHER') && resource.createdBy === actor.actorId;
}

export function requireManage(actor: ActorContext, resource: { createdBy: string }, what: string): void {
	if (!canManage(actor, resource)) {
		throw new PermissionDeniedError(`Not allowed to manage ${what}`);
	}
}
