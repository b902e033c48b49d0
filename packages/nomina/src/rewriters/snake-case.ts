import type { NameRewriter } from "@nomina/core";

type CharCategory = "upper" | "lower" | "digit" | "separator";

const UPPER = /[\p{Lu}\p{Lt}]/u;
const LOWER = /\p{Ll}/u;
const DIGIT = /\p{Nd}/u;

function categorize(char: string): CharCategory | null {
	if (UPPER.test(char)) return "upper";
	if (LOWER.test(char)) return "lower";
	if (DIGIT.test(char)) return "digit";
	return null;
}

/**
 * Splits PascalCase, camelCase and acronym runs into lower-case words joined
 * by `_`. Digits stay attached to the word before them; any other character
 * acts as a single word break. Existing underscores are kept as they are.
 *
 * @example
 * ```ts
 * snakeCase().rewriteName("HTTPServerId"); // "http_server_id"
 * ```
 */
export function snakeCase(locale?: string): NameRewriter {
	const toLower = (char: string) => (locale ? char.toLocaleLowerCase(locale) : char.toLowerCase());

	return {
		rewriteName(name) {
			const chars = Array.from(name);
			let result = "";
			let previous: CharCategory | null = null;

			for (let i = 0; i < chars.length; i++) {
				const char = chars[i] ?? "";
				if (char === "_") {
					result += "_";
					previous = null;
					continue;
				}

				const category = categorize(char);
				switch (category) {
					case "upper": {
						const next = chars[i + 1];
						const startsWord =
							previous === "separator" ||
							previous === "lower" ||
							(previous !== null &&
								previous !== "digit" &&
								next !== undefined &&
								LOWER.test(next));
						if (startsWord) result += "_";
						result += toLower(char);
						break;
					}
					case "lower":
					case "digit":
						if (previous === "separator") result += "_";
						result += char;
						break;
					case null:
						if (previous !== null) previous = "separator";
						continue;
				}
				previous = category;
			}

			return result;
		},
	};
}
