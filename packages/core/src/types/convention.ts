import type {
	ConventionEntityType,
	ConventionForeignKey,
	ConventionIndex,
	ConventionKey,
	ConventionModel,
	ConventionProperty,
} from "./model.js";
import type { RelationalAnnotation } from "./store-object.js";

// =============================================================================
// CONVENTION INTERFACE
// =============================================================================
// A convention reacts to structural mutations of the model while it is built.
// The host delivers each notification synchronously, once per mutation, in
// the order it performs them; writes made by a hook raise nested
// notifications before the hook returns.

export interface AnnotationChange {
	entityType: ConventionEntityType;
	annotation: RelationalAnnotation;
	/** `undefined` when the annotation was removed. */
	value: string | null | undefined;
	/** `undefined` when the annotation did not exist before. */
	oldValue: string | null | undefined;
}

export interface ConventionHooks {
	entityTypeAdded?: (entityType: ConventionEntityType) => void;
	entityTypeBaseTypeChanged?: (
		entityType: ConventionEntityType,
		newBaseType: ConventionEntityType | undefined,
		oldBaseType: ConventionEntityType | undefined,
	) => void;
	entityTypeAnnotationChanged?: (change: AnnotationChange) => void;
	propertyAdded?: (property: ConventionProperty) => void;
	keyAdded?: (key: ConventionKey) => void;
	foreignKeyAdded?: (foreignKey: ConventionForeignKey) => void;
	foreignKeyOwnershipChanged?: (foreignKey: ConventionForeignKey) => void;
	indexAdded?: (index: ConventionIndex) => void;
	/** Delivered once, after every other mutation. */
	modelFinalizing?: (model: ConventionModel) => void;
}

export type ConventionHookName = keyof ConventionHooks;

export interface ModelConvention {
	id: string;

	/**
	 * Convention IDs that must run before this one. The host orders
	 * conventions topologically and rejects missing or circular dependencies.
	 */
	dependencies?: string[];

	hooks: ConventionHooks;
}
