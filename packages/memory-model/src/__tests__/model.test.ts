import type { ModelConvention, StoreObjectIdentifier } from "@nomina/core";
import { NominaError } from "@nomina/core";
import { describe, expect, it } from "vitest";
import { createSchemaModel } from "../model.js";

function table(name: string, schema: string | null = null): StoreObjectIdentifier {
	return { type: "table", name, schema };
}

// =============================================================================
// HELPERS
// =============================================================================

function personWithAddress(options: { navigation?: string; collection?: boolean } = {}) {
	const model = createSchemaModel();
	const person = model.addEntityType("Person");
	person.addProperty("Id");
	person.setPrimaryKey(["Id"]);

	const address = model.addEntityType("Address");
	address.addProperty("Id");
	address.addProperty("Street");
	address.setPrimaryKey(["Id"]);
	address.addForeignKey(["Id"], person, {
		unique: !options.collection,
		navigation: options.navigation,
		ownership: true,
	});
	return { model, person, address };
}

// =============================================================================
// ENTITY TYPES
// =============================================================================

describe("SchemaModel", () => {
	it("derives the short name from a qualified name", () => {
		const model = createSchemaModel();
		const order = model.addEntityType("Shop.Sales.Order");

		expect(order.shortName).toBe("Order");
		expect(order.getTableName()).toBe("Order");
	});

	it("rejects a duplicate entity type", () => {
		const model = createSchemaModel();
		model.addEntityType("Order");
		expect(() => model.addEntityType("Order")).toThrow('Entity type "Order" already exists');
	});

	it("throws NOT_FOUND for an unknown entity type", () => {
		const model = createSchemaModel();
		expect(() => model.getEntityType("Missing")).toThrow(NominaError);
		expect(model.findEntityType("Missing")).toBeUndefined();
	});

	it("uses the default schema for store objects", () => {
		const model = createSchemaModel({ defaultSchema: "sales" });
		const invoice = model.addEntityType("Invoice");
		expect(invoice.getStoreObject("table")).toEqual(table("Invoice", "sales"));
	});

	it("refuses structural changes once finalized", () => {
		const model = createSchemaModel();
		model.addEntityType("Order");
		model.finalize();

		expect(model.isFinalized).toBe(true);
		expect(() => model.addEntityType("Invoice")).toThrow(
			"The model is finalized and can no longer be changed",
		);
	});
});

// =============================================================================
// ANNOTATIONS & PROVENANCE
// =============================================================================

describe("annotations", () => {
	function recordingModel() {
		const changes: string[] = [];
		const recorder: ModelConvention = {
			id: "recorder",
			hooks: {
				entityTypeAnnotationChanged: (change) => {
					changes.push(`${change.annotation}=${String(change.value)}`);
				},
			},
		};
		return { model: createSchemaModel({ conventions: [recorder] }), changes };
	}

	it("notifies only when the stored value changes", () => {
		const { model, changes } = recordingModel();
		const order = model.addEntityType("Order");
		order.toTable("Orders");
		order.toTable("Orders");
		order.toTable(null);
		order.removeAnnotation("TableName");

		expect(changes).toEqual(["TableName=Orders", "TableName=null", "TableName=undefined"]);
	});

	it("refuses lower-precedence writes and removals", () => {
		const model = createSchemaModel();
		const order = model.addEntityType("Order");
		order.toTable("Orders");

		expect(order.setAnnotation("TableName", "order", "convention")).toBe(false);
		expect(order.removeAnnotation("TableName", "convention")).toBe(false);
		expect(order.getTableName()).toBe("Orders");
		expect(order.getAnnotationConfigurationSource("TableName")).toBe("explicit");
	});

	it("maps an entity with a view and no table to the view only", () => {
		const model = createSchemaModel();
		const report = model.addEntityType("Report").toView("ReportView");

		expect(report.getTableName()).toBeNull();
		expect(report.getStoreObject("table")).toBeNull();
		expect(report.getStoreObject("view")).toEqual({ type: "view", name: "ReportView", schema: null });
	});

	it("records a view supplied when the entity is added as convention-sourced", () => {
		const model = createSchemaModel();
		const stats = model.addEntityType("Stats", { view: "StatsView" });

		expect(stats.getViewName()).toBe("StatsView");
		expect(stats.getAnnotationConfigurationSource("ViewName")).toBe("convention");
		expect(stats.getTableName()).toBeNull();
	});

	it("names the SQL query store object after the root type", () => {
		const model = createSchemaModel();
		const report = model.addEntityType("Reports.Report").toSqlQuery("SELECT 1");

		expect(report.getStoreObject("sql-query")).toEqual({
			type: "sql-query",
			name: "Report.SqlQuery",
			schema: null,
		});
	});
});

// =============================================================================
// PROPERTIES & COLUMN NAMES
// =============================================================================

describe("properties", () => {
	it("defaults the column name to the property name", () => {
		const model = createSchemaModel();
		const order = model.addEntityType("Order");
		const total = order.addProperty("Total");

		expect(total.getColumnBaseName()).toBe("Total");
		expect(total.getColumnName(table("Order"))).toBe("Total");
		expect(total.getColumnNameConfigurationSource()).toBeUndefined();
	});

	it("rejects a duplicate property", () => {
		const model = createSchemaModel();
		const order = model.addEntityType("Order");
		order.addProperty("Id");
		expect(() => order.addProperty("Id")).toThrow('Property "Id" already exists on "Order"');
	});

	it("resolves a store-object override before the base name", () => {
		const model = createSchemaModel();
		const order = model.addEntityType("Order");
		const id = order.addProperty("Id");
		id.setColumnName("order_id");
		id.setColumnName("legacy_id", { storeObject: table("Order") });

		expect(id.getColumnBaseName()).toBe("order_id");
		expect(id.getColumnName(table("Order"))).toBe("legacy_id");
		expect(id.getColumnName({ type: "view", name: "OrderView", schema: null })).toBe("order_id");
	});

	it("refuses a convention write over an explicit column name", () => {
		const model = createSchemaModel();
		const id = model.addEntityType("Order").addProperty("Id");
		id.setColumnName("order_id");

		expect(id.canSetColumnName({ source: "convention" })).toBe(false);
		expect(id.setColumnName("id", { source: "convention" })).toBe(false);
		expect(id.getColumnNameConfigurationSource()).toBe("explicit");
	});
});

// =============================================================================
// KEYS, FOREIGN KEYS, INDEXES
// =============================================================================

describe("default names", () => {
	function customerAndOrder() {
		const model = createSchemaModel();
		const customer = model.addEntityType("Customer");
		customer.addProperty("Id");
		customer.addProperty("Email");
		customer.setPrimaryKey(["Id"]);

		const order = model.addEntityType("Order");
		order.addProperty("Id");
		order.addProperty("CustomerId");
		order.setPrimaryKey(["Id"]);
		return { model, customer, order };
	}

	it("names primary and alternate keys after their table", () => {
		const { customer } = customerAndOrder();
		const alternate = customer.addKey(["Email"]);

		expect(customer.findPrimaryKey()?.getName()).toBe("PK_Customer");
		expect(alternate.getName()).toBe("AK_Customer_Email");
	});

	it("names foreign keys and indexes from their columns", () => {
		const { customer, order } = customerAndOrder();
		const fk = order.addForeignKey(["CustomerId"], customer);
		const index = order.addIndex(["CustomerId"]);

		expect(fk.getConstraintName()).toBe("FK_Order_Customer_CustomerId");
		expect(index.getDatabaseName()).toBe("IX_Order_CustomerId");
	});

	it("returns no names without a table", () => {
		const { order } = customerAndOrder();
		const index = order.addIndex(["CustomerId"]);
		order.toTable(null);

		expect(order.findPrimaryKey()?.getName()).toBeNull();
		expect(index.getDatabaseName()).toBeNull();
	});

	it("rejects a foreign key whose arity differs from the principal key", () => {
		const { customer, order } = customerAndOrder();
		expect(() => order.addForeignKey(["Id", "CustomerId"], customer)).toThrow(
			'Foreign key on "Order" has 2 properties but the principal key has 1',
		);
	});

	it("rejects a foreign key to a principal without a primary key", () => {
		const { model, order } = customerAndOrder();
		const tag = model.addEntityType("Tag");
		tag.addProperty("Label");
		expect(() => order.addForeignKey(["CustomerId"], tag)).toThrow(
			'"Tag" has no primary key to reference',
		);
	});
});

// =============================================================================
// INHERITANCE
// =============================================================================

describe("inheritance", () => {
	function animalAndDog() {
		const model = createSchemaModel();
		const animal = model.addEntityType("Animal");
		animal.addProperty("Id");
		animal.setPrimaryKey(["Id"]);
		const dog = model.addEntityType("Dog");
		dog.addProperty("Breed");
		dog.setBaseType(animal);
		return { model, animal, dog };
	}

	it("maps a derived type to its root's table", () => {
		const { animal, dog } = animalAndDog();

		expect(dog.getTableName()).toBe("Animal");
		expect(dog.findPrimaryKey()).toBe(animal.findPrimaryKey());
		expect(animal.getDerivedTypesInclusive()).toEqual([animal, dog]);
		expect(dog.getProperties().map((p) => p.name)).toEqual(["Id", "Breed"]);
	});

	it("rejects a primary key on a derived type", () => {
		const { dog } = animalAndDog();
		expect(() => dog.setPrimaryKey(["Breed"])).toThrow(
			'"Dog" is a derived type; declare the primary key on "Animal"',
		);
	});

	it("rejects an inheritance cycle", () => {
		const { animal, dog } = animalAndDog();
		expect(() => animal.setBaseType(dog)).toThrow(
			'Setting "Dog" as base type of "Animal" would create an inheritance cycle',
		);
	});

	it("resolves key names per table of a TPT hierarchy", () => {
		const { animal, dog } = animalAndDog();
		dog.toTable("Dogs");
		const primaryKey = animal.findPrimaryKey();

		expect(primaryKey?.getName(table("Animal"))).toBe("PK_Animal");
		expect(primaryKey?.getName(table("Dogs"))).toBe("PK_Dogs");
		expect(primaryKey?.getName(table("Cats"))).toBeNull();
	});

	it("applies a configured key name at every table of the hierarchy", () => {
		const { animal, dog } = animalAndDog();
		dog.toTable("Dogs");
		animal.findPrimaryKey()?.setName("PK_Animals");

		expect(animal.findPrimaryKey()?.getName(table("Dogs"))).toBe("PK_Animals");
	});

	it("maps to its own table again after leaving the hierarchy", () => {
		const { dog } = animalAndDog();
		dog.setBaseType(undefined);
		expect(dog.getTableName()).toBe("Dog");
	});
});

// =============================================================================
// OWNERSHIP & TABLE SPLITTING
// =============================================================================

describe("ownership", () => {
	it("splits a reference-owned entity into its owner's table", () => {
		const { address } = personWithAddress({ navigation: "HomeAddress" });

		expect(address.getTableName()).toBe("Person");
		expect(address.getProperty("Street").getColumnName(table("Person"))).toBe("HomeAddress_Street");
	});

	it("falls back to the owner's short name without a navigation", () => {
		const { address } = personWithAddress();
		expect(address.getProperty("Street").getColumnName(table("Person"))).toBe("Person_Street");
	});

	it("shares the owner's key column and key name", () => {
		const { address } = personWithAddress({ navigation: "HomeAddress" });

		expect(address.getProperty("Id").getColumnName(table("Person"))).toBe("Id");
		expect(address.findRowInternalForeignKeys(table("Person"))).toHaveLength(1);
		expect(address.findPrimaryKey()?.getName()).toBe("PK_Person");
	});

	it("prefixes nested owned entities outermost first", () => {
		const { model, address } = personWithAddress({ navigation: "HomeAddress" });
		const geo = model.addEntityType("Geo");
		geo.addProperty("Id");
		geo.addProperty("Lat");
		geo.setPrimaryKey(["Id"]);
		geo.addForeignKey(["Id"], address, { unique: true, navigation: "Location", ownership: true });

		expect(geo.getTableName()).toBe("Person");
		expect(geo.getProperty("Lat").getColumnName(table("Person"))).toBe("HomeAddress_Location_Lat");
	});

	it("keeps a collection-owned entity in its own table", () => {
		const { address } = personWithAddress({ collection: true });

		expect(address.getTableName()).toBe("Address");
		expect(address.getProperty("Street").getColumnName(table("Address"))).toBe("Street");
	});

	it("stops splitting once the owned entity gets its own table", () => {
		const { address } = personWithAddress({ navigation: "HomeAddress" });
		address.toTable("Addresses");

		expect(address.getProperty("Street").getColumnName(table("Addresses"))).toBe("Street");
		expect(address.findRowInternalForeignKeys(table("Addresses"))).toEqual([]);
		expect(address.findPrimaryKey()?.getName()).toBe("PK_Addresses");
	});
});
