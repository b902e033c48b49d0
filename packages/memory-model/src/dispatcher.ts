// =============================================================================
// CONVENTION DISPATCHER
// =============================================================================
// Orders conventions by their declared dependencies and delivers structural
// notifications to the conventions that define the matching hook.
//
// Hook presence is pre-computed once, so dispatch only iterates conventions
// that actually handle the notification. Hooks run sequentially in dependency
// order; an error thrown by a hook aborts the mutation that raised it.

import type {
	AnnotationChange,
	ConventionEntityType,
	ConventionForeignKey,
	ConventionHookName,
	ConventionIndex,
	ConventionKey,
	ConventionModel,
	ConventionProperty,
	ModelConvention,
} from "@nomina/core";
import { NominaError } from "@nomina/core";

const CONVENTION_HOOKS = [
	"entityTypeAdded",
	"entityTypeBaseTypeChanged",
	"entityTypeAnnotationChanged",
	"propertyAdded",
	"keyAdded",
	"foreignKeyAdded",
	"foreignKeyOwnershipChanged",
	"indexAdded",
	"modelFinalizing",
] as const satisfies readonly ConventionHookName[];

export type HookCache = Record<ConventionHookName, ModelConvention[]>;

/** Build a hook cache from the sorted convention list. */
export function buildHookCache(conventions: ModelConvention[]): HookCache {
	const cache: Partial<HookCache> = {};
	for (const hook of CONVENTION_HOOKS) {
		cache[hook] = conventions.filter((c) => c.hooks[hook] !== undefined);
	}
	return {
		entityTypeAdded: cache.entityTypeAdded ?? [],
		entityTypeBaseTypeChanged: cache.entityTypeBaseTypeChanged ?? [],
		entityTypeAnnotationChanged: cache.entityTypeAnnotationChanged ?? [],
		propertyAdded: cache.propertyAdded ?? [],
		keyAdded: cache.keyAdded ?? [],
		foreignKeyAdded: cache.foreignKeyAdded ?? [],
		foreignKeyOwnershipChanged: cache.foreignKeyOwnershipChanged ?? [],
		indexAdded: cache.indexAdded ?? [],
		modelFinalizing: cache.modelFinalizing ?? [],
	};
}

// =============================================================================
// DEPENDENCY VALIDATION & TOPOLOGICAL SORT
// =============================================================================

/**
 * Sort conventions so every convention runs after its dependencies.
 * Conventions without a dependency relation keep their registration order.
 */
export function sortConventions(conventions: ModelConvention[]): ModelConvention[] {
	const byId = new Map<string, ModelConvention>();
	for (const convention of conventions) {
		if (byId.has(convention.id)) {
			throw NominaError.invalidArgument(`Duplicate convention ID: "${convention.id}"`);
		}
		byId.set(convention.id, convention);
	}

	const sorted: ModelConvention[] = [];
	const placed = new Set<string>();
	// Ids whose dependencies are being placed, outermost first
	const path: string[] = [];

	const place = (convention: ModelConvention): void => {
		if (placed.has(convention.id)) return;
		const start = path.indexOf(convention.id);
		if (start !== -1) {
			const cycle = [...path.slice(start), convention.id];
			throw NominaError.invalidArgument(`Circular convention dependency: ${cycle.join(" -> ")}`);
		}

		path.push(convention.id);
		for (const dependencyId of convention.dependencies ?? []) {
			const dependency = byId.get(dependencyId);
			if (!dependency) {
				throw NominaError.invalidArgument(
					`Convention "${convention.id}" requires convention "${dependencyId}" which is not registered`,
				);
			}
			place(dependency);
		}
		path.pop();

		placed.add(convention.id);
		sorted.push(convention);
	};

	for (const convention of conventions) place(convention);
	return sorted;
}

// =============================================================================
// DISPATCHER
// =============================================================================

export interface ConventionDispatcher {
	/** Conventions in the order their hooks run. */
	readonly conventions: readonly ModelConvention[];
	entityTypeAdded(entityType: ConventionEntityType): void;
	entityTypeBaseTypeChanged(
		entityType: ConventionEntityType,
		newBaseType: ConventionEntityType | undefined,
		oldBaseType: ConventionEntityType | undefined,
	): void;
	entityTypeAnnotationChanged(change: AnnotationChange): void;
	propertyAdded(property: ConventionProperty): void;
	keyAdded(key: ConventionKey): void;
	foreignKeyAdded(foreignKey: ConventionForeignKey): void;
	foreignKeyOwnershipChanged(foreignKey: ConventionForeignKey): void;
	indexAdded(index: ConventionIndex): void;
	modelFinalizing(model: ConventionModel): void;
}

export function createConventionDispatcher(conventions: ModelConvention[]): ConventionDispatcher {
	const sorted = sortConventions(conventions);
	const cache = buildHookCache(sorted);

	return {
		conventions: sorted,
		entityTypeAdded(entityType) {
			for (const c of cache.entityTypeAdded) c.hooks.entityTypeAdded?.(entityType);
		},
		entityTypeBaseTypeChanged(entityType, newBaseType, oldBaseType) {
			for (const c of cache.entityTypeBaseTypeChanged) {
				c.hooks.entityTypeBaseTypeChanged?.(entityType, newBaseType, oldBaseType);
			}
		},
		entityTypeAnnotationChanged(change) {
			for (const c of cache.entityTypeAnnotationChanged) {
				c.hooks.entityTypeAnnotationChanged?.(change);
			}
		},
		propertyAdded(property) {
			for (const c of cache.propertyAdded) c.hooks.propertyAdded?.(property);
		},
		keyAdded(key) {
			for (const c of cache.keyAdded) c.hooks.keyAdded?.(key);
		},
		foreignKeyAdded(foreignKey) {
			for (const c of cache.foreignKeyAdded) c.hooks.foreignKeyAdded?.(foreignKey);
		},
		foreignKeyOwnershipChanged(foreignKey) {
			for (const c of cache.foreignKeyOwnershipChanged) {
				c.hooks.foreignKeyOwnershipChanged?.(foreignKey);
			}
		},
		indexAdded(index) {
			for (const c of cache.indexAdded) c.hooks.indexAdded?.(index);
		},
		modelFinalizing(model) {
			for (const c of cache.modelFinalizing) c.hooks.modelFinalizing?.(model);
		},
	};
}
