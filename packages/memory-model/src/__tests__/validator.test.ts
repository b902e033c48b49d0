import { NominaError } from "@nomina/core";
import { describe, expect, it } from "vitest";
import { createSchemaModel } from "../model.js";
import { findNameCollisions } from "../validator.js";

function orderAndInvoice() {
	const model = createSchemaModel();
	const order = model.addEntityType("Order");
	order.addProperty("Id");
	order.addProperty("Number");
	order.setPrimaryKey(["Id"]);
	const invoice = model.addEntityType("Invoice");
	invoice.addProperty("Id");
	invoice.addProperty("Number");
	invoice.setPrimaryKey(["Id"]);
	return { model, order, invoice };
}

describe("validateModel", () => {
	it("accepts distinct default names", () => {
		const { model, order, invoice } = orderAndInvoice();
		order.addIndex(["Number"]);
		invoice.addIndex(["Number"]);

		expect(findNameCollisions(model)).toEqual([]);
		expect(() => model.finalize()).not.toThrow();
	});

	it("rejects the same index name on two tables of one schema", () => {
		const { model, order, invoice } = orderAndInvoice();
		order.addIndex(["Number"]).setDatabaseName("IX_Number");
		invoice.addIndex(["Number"]).setDatabaseName("IX_Number");

		expect(() => model.finalize()).toThrow('Duplicate index name "IX_Number" on tables "Order" and "Invoice"');
	});

	it("allows the same name in different schemas", () => {
		const { model, order, invoice } = orderAndInvoice();
		order.toTable("Order", "sales");
		invoice.toTable("Invoice", "billing");
		order.addIndex(["Number"]).setDatabaseName("IX_Number");
		invoice.addIndex(["Number"]).setDatabaseName("IX_Number");

		expect(findNameCollisions(model)).toEqual([]);
	});

	it("reports a configured key name shared by the tables of a TPT hierarchy", () => {
		const model = createSchemaModel();
		const animal = model.addEntityType("Animal");
		animal.addProperty("Id");
		animal.setPrimaryKey(["Id"]).setName("PK_Animal");
		const dog = model.addEntityType("Dog");
		dog.setBaseType(animal);
		dog.toTable("Dog");

		expect(findNameCollisions(model)).toEqual([
			{ kind: "key", name: "PK_Animal", owners: ["Animal", "Dog"] },
		]);
		expect(() => model.finalize()).toThrow('Duplicate key name "PK_Animal" on tables "Animal" and "Dog"');
	});

	it("reports explicit column names colliding in a shared table", () => {
		const model = createSchemaModel();
		const person = model.addEntityType("Person");
		person.addProperty("Id");
		person.setPrimaryKey(["Id"]);
		const employee = model.addEntityType("Employee");
		employee.addProperty("Name").setColumnName("Label");
		const manager = model.addEntityType("Manager");
		manager.addProperty("Title").setColumnName("Label");
		employee.setBaseType(person);
		manager.setBaseType(person);

		let caught: unknown;
		try {
			model.finalize();
		} catch (error) {
			caught = error;
		}
		expect(caught).toBeInstanceOf(NominaError);
		expect(caught).toMatchObject({
			code: "DUPLICATE_NAME",
			message: 'Column name "Label" is used more than once in table "Person"',
		});
	});
});
