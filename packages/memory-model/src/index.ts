export {
	type EntityDefinition,
	type IndexDefinition,
	type ModelDefinition,
	type PropertyDefinition,
	type RelationshipDefinition,
	buildModel,
	parseModelDefinition,
} from "./definition.js";
export {
	buildHookCache,
	type ConventionDispatcher,
	createConventionDispatcher,
	type HookCache,
	sortConventions,
} from "./dispatcher.js";
export { EntityType, type ForeignKeyOptions } from "./entity-type.js";
export { ForeignKey } from "./foreign-key.js";
export { Key } from "./key.js";
export {
	type AddEntityTypeOptions,
	createSchemaModel,
	SchemaModel,
	type SchemaModelOptions,
} from "./model.js";
export { columnPrefix, Property } from "./property.js";
export { groupByTable, SHARED_TABLE_COLUMNS_ID, sharedTableColumns } from "./shared-table-columns.js";
export { TableIndex } from "./table-index.js";
export { findNameCollisions, type NameCollision, validateModel } from "./validator.js";
