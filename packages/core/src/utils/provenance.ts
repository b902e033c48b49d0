import { CONFIGURATION_SOURCES, type ConfigurationSource } from "../types/store-object.js";

/**
 * Whether a write from `source` may replace a name stored from `existing`.
 * An absent name can always be written.
 */
export function canOverride(
	source: ConfigurationSource,
	existing: ConfigurationSource | undefined,
): boolean {
	if (existing === undefined) return true;
	return CONFIGURATION_SOURCES.indexOf(source) >= CONFIGURATION_SOURCES.indexOf(existing);
}

