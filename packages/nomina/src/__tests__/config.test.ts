import type { NamingOptions } from "@nomina/core";
import { NominaError } from "@nomina/core";
import { describe, expect, it } from "vitest";
import { validateConfig } from "../config/index.js";

function fromJson(json: string): NamingOptions {
	return JSON.parse(json);
}

describe("validateConfig", () => {
	it("accepts an empty configuration", () => {
		expect(() => validateConfig({})).not.toThrow();
	});

	it("accepts a convention with a locale", () => {
		expect(() => validateConfig({ convention: "camel_case", locale: "en-US" })).not.toThrow();
	});

	it("accepts a custom rewriter", () => {
		expect(() => validateConfig({ rewriter: { rewriteName: (name) => name } })).not.toThrow();
	});

	it("rejects a convention combined with a custom rewriter", () => {
		expect(() =>
			validateConfig({ convention: "snake_case", rewriter: { rewriteName: (name) => name } }),
		).toThrow("Nomina config: 'convention' and 'rewriter' are mutually exclusive");
	});

	it("rejects an unknown convention", () => {
		expect(() => validateConfig(fromJson('{"convention":"kebab_case"}'))).toThrow(
			'Nomina config: unknown convention "kebab_case". Use one of snake_case, lower_case, upper_case, upper_snake_case, camel_case.',
		);
	});

	it("rejects a rewriter without rewriteName", () => {
		expect(() => validateConfig(fromJson('{"rewriter":{}}'))).toThrow(
			"Nomina config: 'rewriter' must have a rewriteName(name) method",
		);
	});

	it("rejects a locale that is not a string", () => {
		expect(() => validateConfig(fromJson('{"locale":5}'))).toThrow(
			"Nomina config: 'locale' must be a string",
		);
	});

	it("rejects a malformed locale and keeps the cause", () => {
		let caught: unknown;
		try {
			validateConfig({ locale: "not a locale!" });
		} catch (error) {
			caught = error;
		}
		expect(caught).toBeInstanceOf(NominaError);
		expect(caught).toMatchObject({
			code: "INVALID_ARGUMENT",
			message: 'Nomina config: invalid locale "not a locale!"',
		});
		expect(caught instanceof NominaError && caught.cause).toBeInstanceOf(RangeError);
	});
});
