import type { StoreObjectIdentifier } from "../types/store-object.js";

/** Stable map key for a store object: `table:sales.person`. */
export function storeObjectKey(storeObject: StoreObjectIdentifier): string {
	return `${storeObject.type}:${formatStoreObjectName(storeObject)}`;
}

/** Schema-qualified display name: `sales.person`, or `person` without schema. */
export function formatStoreObjectName(storeObject: StoreObjectIdentifier): string {
	return storeObject.schema ? `${storeObject.schema}.${storeObject.name}` : storeObject.name;
}

export function isSameStoreObject(
	a: StoreObjectIdentifier | null | undefined,
	b: StoreObjectIdentifier | null | undefined,
): boolean {
	if (!a || !b) return false;
	return a.type === b.type && a.name === b.name && a.schema === b.schema;
}
