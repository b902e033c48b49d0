import { canOverride, type ConfigurationSource } from "@nomina/core";

/**
 * A single nameable slot together with the source that wrote it.
 * Writes and removals at a lower precedence than the stored source are refused.
 */
export class ConfiguredName {
	private current: { value: string; source: ConfigurationSource } | undefined;

	get value(): string | undefined {
		return this.current?.value;
	}

	get source(): ConfigurationSource | undefined {
		return this.current?.source;
	}

	canSet(source: ConfigurationSource): boolean {
		return canOverride(source, this.current?.source);
	}

	set(value: string, source: ConfigurationSource): boolean {
		if (!this.canSet(source)) return false;
		this.current = { value, source };
		return true;
	}

	remove(source: ConfigurationSource): boolean {
		if (!this.canSet(source)) return false;
		this.current = undefined;
		return true;
	}
}
