import { describe, expect, it } from "vitest";
import {
	camelCase,
	createNameRewriter,
	lowerCase,
	snakeCase,
	upperCase,
	upperSnakeCase,
} from "../rewriters/index.js";

describe("snakeCase", () => {
	const { rewriteName } = snakeCase();

	it("splits PascalCase words", () => {
		expect(rewriteName("Person")).toBe("person");
		expect(rewriteName("FullName")).toBe("full_name");
		expect(rewriteName("customerId")).toBe("customer_id");
	});

	it("starts a new word at the last capital of an acronym", () => {
		expect(rewriteName("HTTPServerId")).toBe("http_server_id");
		expect(rewriteName("PK_Person")).toBe("pk_person");
	});

	it("keeps digits attached to the preceding word", () => {
		expect(rewriteName("Address2Line")).toBe("address2line");
		expect(rewriteName("Line2")).toBe("line2");
	});

	it("turns other characters into a single word break", () => {
		expect(rewriteName("Order Line")).toBe("order_line");
		expect(rewriteName("Customer-ID")).toBe("customer_id");
		expect(rewriteName("Order  -  Line")).toBe("order_line");
	});

	it("preserves explicit underscores", () => {
		expect(rewriteName("_Hidden")).toBe("_hidden");
		expect(rewriteName("Street_Name")).toBe("street_name");
		expect(rewriteName("already_snake")).toBe("already_snake");
	});

	it("handles letters outside ASCII", () => {
		expect(rewriteName("ÉcoleNormale")).toBe("école_normale");
	});

	it("returns an empty name unchanged", () => {
		expect(rewriteName("")).toBe("");
	});

	it("is stable on its own output", () => {
		expect(rewriteName(rewriteName("HTTPServerId"))).toBe("http_server_id");
	});
});

describe("other rewriters", () => {
	it("lower-cases and upper-cases whole names", () => {
		expect(lowerCase().rewriteName("FullName")).toBe("fullname");
		expect(upperCase().rewriteName("FullName")).toBe("FULLNAME");
	});

	it("upper-cases snake case", () => {
		expect(upperSnakeCase().rewriteName("FullName")).toBe("FULL_NAME");
	});

	it("lower-cases the first character for camel case", () => {
		expect(camelCase().rewriteName("FullName")).toBe("fullName");
		expect(camelCase().rewriteName("")).toBe("");
	});
});

describe("createNameRewriter", () => {
	it("creates the rewriter for each convention", () => {
		expect(createNameRewriter("snake_case").rewriteName("OrderLine")).toBe("order_line");
		expect(createNameRewriter("lower_case").rewriteName("OrderLine")).toBe("orderline");
		expect(createNameRewriter("upper_case").rewriteName("OrderLine")).toBe("ORDERLINE");
		expect(createNameRewriter("upper_snake_case").rewriteName("OrderLine")).toBe("ORDER_LINE");
		expect(createNameRewriter("camel_case").rewriteName("OrderLine")).toBe("orderLine");
	});

	it("applies locale-specific case mapping", () => {
		expect(createNameRewriter("snake_case").rewriteName("Id")).toBe("id");
		expect(createNameRewriter("snake_case", { locale: "tr-TR" }).rewriteName("Id")).toBe("ıd");
		expect(createNameRewriter("upper_case", { locale: "tr-TR" }).rewriteName("id")).toBe("İD");
	});
});
