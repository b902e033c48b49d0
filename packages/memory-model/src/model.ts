// =============================================================================
// SCHEMA MODEL: In-process host for model conventions
// =============================================================================
// Holds the entity types of one relational schema while it is being built,
// dispatches structural notifications to the registered conventions, and
// validates database names once the model is finalized.

import type { ConventionModel, ModelConvention, NominaLogger } from "@nomina/core";
import { NominaError, RELATIONAL_ANNOTATIONS } from "@nomina/core";
import { createConsoleLogger } from "@nomina/core/logger";
import { type ConventionDispatcher, createConventionDispatcher } from "./dispatcher.js";
import { EntityType } from "./entity-type.js";
import { sharedTableColumns } from "./shared-table-columns.js";
import { validateModel } from "./validator.js";

export interface SchemaModelOptions {
	/** Conventions to run, in addition to the built-in shared-table column pass. */
	conventions?: ModelConvention[];
	/** Schema used by entity types without one. Default: `null` */
	defaultSchema?: string | null;
	/** Custom logger */
	logger?: NominaLogger;
}

export interface AddEntityTypeOptions {
	/** View name supplied by convention when the type is added (keyless query types). */
	view?: string;
}

type ModelState = "building" | "finalizing" | "finalized";

export class SchemaModel implements ConventionModel {
	readonly defaultSchema: string | null;
	readonly dispatcher: ConventionDispatcher;
	readonly logger: NominaLogger;

	private readonly entityTypes = new Map<string, EntityType>();
	private state: ModelState = "building";

	constructor(options: SchemaModelOptions = {}) {
		this.defaultSchema = options.defaultSchema ?? null;
		this.logger = options.logger ?? createConsoleLogger();
		this.dispatcher = createConventionDispatcher([
			sharedTableColumns(),
			...(options.conventions ?? []),
		]);
	}

	get isFinalized(): boolean {
		return this.state === "finalized";
	}

	addEntityType(name: string, options: AddEntityTypeOptions = {}): EntityType {
		this.assertMutable();
		if (this.entityTypes.has(name)) {
			throw NominaError.duplicate(`Entity type "${name}" already exists`, { entityType: name });
		}
		const entityType = new EntityType(name, this);
		if (options.view !== undefined) {
			entityType.initAnnotation(RELATIONAL_ANNOTATIONS.VIEW_NAME, options.view, "convention");
		}
		this.entityTypes.set(name, entityType);
		this.dispatcher.entityTypeAdded(entityType);
		return entityType;
	}

	findEntityType(name: string): EntityType | undefined {
		return this.entityTypes.get(name);
	}

	getEntityType(name: string): EntityType {
		const entityType = this.entityTypes.get(name);
		if (!entityType) {
			throw NominaError.notFound(`Entity type "${name}" not found`, { entityType: name });
		}
		return entityType;
	}

	getEntityTypes(): readonly EntityType[] {
		return [...this.entityTypes.values()];
	}

	/**
	 * Run the finalization conventions, then validate database names.
	 * The model is read-only afterwards.
	 */
	finalize(): this {
		this.assertMutable();
		this.state = "finalizing";
		this.dispatcher.modelFinalizing(this);
		this.state = "finalized";
		this.validate();
		this.logger.debug("Model finalized", { entityTypes: this.entityTypes.size });
		return this;
	}

	/** Throws `DUPLICATE_NAME` when database names collide. */
	validate(): void {
		validateModel(this);
	}

	/** @internal */
	assertMutable(): void {
		if (this.state === "finalized") {
			throw NominaError.conflict("The model is finalized and can no longer be changed");
		}
	}
}

export function createSchemaModel(options: SchemaModelOptions = {}): SchemaModel {
	return new SchemaModel(options);
}
