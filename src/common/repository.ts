import type { BaseEntity } from './types.js';

// Generic repository contract matching the tenant-aware repositories.
export interface Repository<T> {
	save(entity: T): T;
	getById(tenantId: string, id: string): T | undefined;
}

/** In-memory repositories can capture their state and later roll back to it. */
export interface Snapshottable {
	snapshot(): () => void;
}

export interface InMemoryTable<T extends BaseEntity> extends Snapshottable {
	put(entity: T): T;
	get(tenantId: string, id: string): T | undefined;
	values(): T[];
	delete(tenantId: string, id: string): void;
}

/**
 * Tenant-keyed Map holding copies of what is stored, so callers can never
 * change persisted state by mutating a returned object.
 */
export function createInMemoryTable<T extends BaseEntity>(): InMemoryTable<T> {
	let store = new Map<string, T>();
	const keyOf = (tenantId: string, id: string) => `${tenantId}::${id}`;
	return {
		put(entity) {
			store.set(keyOf(entity.tenantId, entity.id), structuredClone(entity));
			return entity;
		},
		get(tenantId, id) {
			const found = store.get(keyOf(tenantId, id));
			return found ? structuredClone(found) : undefined;
		},
		values() {
			return Array.from(store.values(), entity => structuredClone(entity));
		},
		delete(tenantId, id) {
			store.delete(keyOf(tenantId, id));
		},
		snapshot() {
			const saved = new Map(store);
			return () => {
				store = saved;
			};
		},
	};
}
