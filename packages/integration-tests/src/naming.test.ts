import { RELATIONAL_ANNOTATIONS } from "@nomina/core";
import type { SchemaModel } from "@nomina/memory-model";
import { assertNamesDerivedFromDefaults, findImpureNames, getTestModel } from "@nomina/test-utils";
import { snakeCase, upperSnakeCase } from "nomina";
import { describe, expect, it } from "vitest";
import { table } from "./setup.js";

const snake = snakeCase();

function animalHierarchy() {
	const { model, naming } = getTestModel();
	const animal = model.addEntityType("Zoo.Animal");
	animal.addProperty("Id");
	animal.setPrimaryKey(["Id"]);
	const dog = model.addEntityType("Zoo.Dog");
	dog.addProperty("Breed");
	return { model, naming, animal, dog };
}

function addPerson(model: SchemaModel) {
	const person = model.addEntityType("Contacts.Person");
	person.addProperty("Id");
	person.setPrimaryKey(["Id"]);
	return person;
}

function addAddress(model: SchemaModel) {
	const address = model.addEntityType("Contacts.Address");
	address.addProperty("Id");
	address.setPrimaryKey(["Id"]);
	return address;
}

/** Column, key and constraint names of the contacts model at the Address table. */
function addressNames(model: SchemaModel) {
	const address = model.getEntityType("Contacts.Address");
	const store = address.getStoreObject("table");
	return {
		table: address.getTableName(),
		street: store ? address.getProperty("Street").getColumnName(store) : null,
		id: store ? address.getProperty("Id").getColumnName(store) : null,
		key: address.findPrimaryKey()?.getName() ?? null,
		ownership: address.getDeclaredForeignKeys()[0]?.getConstraintName() ?? null,
	};
}

describe("Naming scenarios", () => {
	// =========================================================================
	// INHERITANCE
	// =========================================================================

	describe("TPH collapse", () => {
		it("maps a derived type to its root's rewritten table", () => {
			const { model, animal, dog } = animalHierarchy();
			dog.setBaseType(animal);

			expect(dog.getAnnotationConfigurationSource(RELATIONAL_ANNOTATIONS.TABLE_NAME)).toBeUndefined();
			expect(animal.getTableName()).toBe("animal");
			expect(dog.getTableName()).toBe("animal");
			expect(dog.getProperty("Breed").getColumnName(table("animal"))).toBe("breed");
			assertNamesDerivedFromDefaults(model, snake);
		});
	});

	describe("TPT split", () => {
		it("clears the key name so each table gets its own", () => {
			const { model, animal, dog } = animalHierarchy();
			dog.setBaseType(animal);
			dog.toTable("dogs");
			const key = animal.findPrimaryKey();

			expect(key?.getNameConfigurationSource()).toBeUndefined();
			expect(key?.getName(table("animal"))).toBe("PK_animal");
			expect(key?.getName(table("dogs"))).toBe("PK_dogs");
			assertNamesDerivedFromDefaults(model, snake);
			expect(() => model.finalize()).not.toThrow();
		});
	});

	// =========================================================================
	// OWNERSHIP
	// =========================================================================

	describe("ownership and table splitting", () => {
		function splitModel() {
			const { model, naming } = getTestModel();
			const person = addPerson(model);
			const address = addAddress(model);
			address.addProperty("Street");
			address.addForeignKey(["Id"], person, { unique: true, ownership: true });
			return { model, naming, person, address };
		}

		it("moves an owned reference into its owner's table", () => {
			const { model } = splitModel();

			expect(addressNames(model)).toEqual({
				table: "person",
				street: "person_street",
				id: "id",
				key: "pk_person",
				ownership: "fk_person_person_id",
			});
			expect(
				model
					.getEntityType("Contacts.Address")
					.getAnnotationConfigurationSource(RELATIONAL_ANNOTATIONS.TABLE_NAME),
			).toBeUndefined();
			assertNamesDerivedFromDefaults(model, snake);
		});

		it("undoes the split once the owned type gets its own table", () => {
			const { model, address } = splitModel();
			address.toTable("addresses");

			expect(addressNames(model)).toEqual({
				table: "addresses",
				street: "street",
				id: "id",
				key: "pk_addresses",
				ownership: "fk_addresses_person_id",
			});
			assertNamesDerivedFromDefaults(model, snake);
		});

		it("does not depend on whether columns come before or after the ownership", () => {
			const { model } = getTestModel();
			const person = addPerson(model);
			const address = addAddress(model);
			address.addForeignKey(["Id"], person, { unique: true, ownership: true });
			address.addProperty("Street");

			expect(addressNames(model)).toEqual(addressNames(splitModel().model));
		});

		it("keeps the owner's table when the owner is renamed explicitly", () => {
			const { model, person } = splitModel();
			person.toTable("people");

			expect(addressNames(model)).toEqual({
				table: "people",
				street: "person_street",
				id: "id",
				key: "pk_people",
				ownership: "fk_people_people_id",
			});
			assertNamesDerivedFromDefaults(model, snake);
		});

		it("renames the indexes and foreign keys of an owned type split into a renamed owner", () => {
			const { model, person, address } = splitModel();
			const country = model.addEntityType("Contacts.Country");
			country.addProperty("Id");
			country.setPrimaryKey(["Id"]);
			address.addProperty("CountryId");
			const index = address.addIndex(["Street"]);
			const toCountry = address.addForeignKey(["CountryId"], country);

			expect(index.getDatabaseName()).toBe("ix_person_person_street");
			person.toTable("people");

			expect(index.getDatabaseName()).toBe("ix_people_person_street");
			expect(toCountry.getConstraintName()).toBe("fk_people_country_person_country_id");
			assertNamesDerivedFromDefaults(model, snake);
		});

		describe("nested owned types", () => {
			/** Geo is split into Address before Address is split into Person. */
			function nestedModel() {
				const { model } = getTestModel();
				const person = addPerson(model);
				const address = addAddress(model);
				const geo = model.addEntityType("Contacts.Geo");
				geo.addProperty("Id");
				geo.setPrimaryKey(["Id"]);
				geo.addProperty("Lat");
				geo.addForeignKey(["Id"], address, { unique: true, ownership: true });
				const lat = geo.getProperty("Lat");
				const latBefore = lat.getColumnName(table("address"));
				address.addForeignKey(["Id"], person, { unique: true, ownership: true });
				return { model, address, geo, lat, latBefore };
			}

			it("re-prefixes columns of a type already split into the newly owned one", () => {
				const { model, geo, lat, latBefore } = nestedModel();

				expect(latBefore).toBe("address_lat");
				expect(geo.getTableName()).toBe("person");
				expect(lat.getColumnBaseName()).toBe("person_address_lat");
				expect(lat.getColumnName(table("person"))).toBe("person_address_lat");
				assertNamesDerivedFromDefaults(model, snake);
			});

			it("drops the outer prefix again when the middle type gets its own table", () => {
				const { model, address, geo, lat } = nestedModel();
				address.toTable("addresses");

				expect(geo.getTableName()).toBe("addresses");
				expect(lat.getColumnName(table("addresses"))).toBe("address_lat");
				assertNamesDerivedFromDefaults(model, snake);
			});
		});
	});

	// =========================================================================
	// FINALIZATION
	// =========================================================================

	describe("finalization fixup", () => {
		it("rewrites the entity prefix of disambiguated columns once", () => {
			const { model } = getTestModel();
			const person = addPerson(model);
			const employee = model.addEntityType("Contacts.Employee");
			employee.addProperty("Name");
			const manager = model.addEntityType("Contacts.Manager");
			manager.addProperty("Name");
			employee.setBaseType(person);
			manager.setBaseType(person);
			model.finalize();

			expect(employee.getProperty("Name").getColumnName(table("person"))).toBe("employee_name");
			expect(manager.getProperty("Name").getColumnName(table("person"))).toBe("manager_name");
		});
	});

	// =========================================================================
	// PROVENANCE
	// =========================================================================

	describe("explicit preservation", () => {
		it("never changes an explicit name through later structural events", () => {
			const { model } = getTestModel();
			const person = addPerson(model);
			const address = addAddress(model);
			const street = address.addProperty("Street");
			street.setColumnName("STREET");
			const ownership = address.addForeignKey(["Id"], person, { unique: true, ownership: true });
			ownership.setConstraintName("FK_Address_Owner");

			expect(street.getColumnName(table("person"))).toBe("STREET");
			address.toTable("addresses");
			expect(street.getColumnName(table("addresses"))).toBe("STREET");
			expect(ownership.getConstraintName()).toBe("FK_Address_Owner");
			person.toTable("people");
			expect(ownership.getConstraintName()).toBe("FK_Address_Owner");
		});
	});

	describe("idempotence", () => {
		it("gives the same names when every event is delivered twice", () => {
			const once = getTestModel();
			const twice = getTestModel();
			for (const { model } of [once, twice]) {
				const person = addPerson(model);
				const address = addAddress(model);
				address.addProperty("Street");
				address.addForeignKey(["Id"], person, { unique: true, ownership: true });
			}

			const { model, naming } = twice;
			const address = model.getEntityType("Contacts.Address");
			const person = model.getEntityType("Contacts.Person");
			for (const entityType of [person, address]) {
				naming.hooks.entityTypeAnnotationChanged?.({
					entityType,
					annotation: RELATIONAL_ANNOTATIONS.TABLE_NAME,
					value: entityType.getTableName(),
					oldValue: entityType.getTableName(),
				});
				for (const property of entityType.getDeclaredProperties()) {
					naming.hooks.propertyAdded?.(property);
				}
			}
			for (const foreignKey of address.getDeclaredForeignKeys()) {
				naming.hooks.foreignKeyAdded?.(foreignKey);
				naming.hooks.foreignKeyOwnershipChanged?.(foreignKey);
			}

			expect(addressNames(model)).toEqual(addressNames(once.model));
			expect(findImpureNames(model, snake)).toEqual([]);
		});
	});

	describe("default purity", () => {
		it("holds for another convention", () => {
			const { model } = getTestModel({ naming: { convention: "upper_snake_case" } });
			const person = addPerson(model);
			const address = addAddress(model);
			address.addProperty("Street");
			address.addIndex(["Street"]);
			address.addForeignKey(["Id"], person, { unique: true, ownership: true });

			expect(findImpureNames(model, upperSnakeCase())).toEqual([]);
			expect(address.getDeclaredIndexes()[0]?.getDatabaseName()).toBe("IX_PERSON_PERSON_STREET");
		});

		it("reports a name that was rewritten twice", () => {
			const { model } = getTestModel();
			const order = model.addEntityType("Sales.Order");
			order.addProperty("Id");
			order.setPrimaryKey(["Id"]);
			order.findPrimaryKey()?.setName("pk_pk_order", "convention");

			expect(findImpureNames(model, snake)).toEqual([
				'key of Sales.Order: expected "pk_order", got "pk_pk_order"',
			]);
			expect(() => assertNamesDerivedFromDefaults(model, snake)).toThrow(
				"Names not derived from their defaults",
			);
		});
	});
});
