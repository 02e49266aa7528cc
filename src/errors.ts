export function isNodeError(err: unknown): err is NodeJS.ErrnoException {
	return err instanceof Error && "code" in err;
}

export function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}

/**
 * A single skill or agent could not be converted for a target. Only that
 * unit is skipped; the rest of the bundle still installs.
 */
export class SchemaViolation extends Error {
	readonly unit: string;
	readonly constraint: string;

	constructor(unit: string, constraint: string) {
		super(`${unit}: ${constraint}`);
		this.name = "SchemaViolation";
		this.unit = unit;
		this.constraint = constraint;
	}
}

export class InvalidSettingsError extends Error {
	readonly filePath: string;

	constructor(filePath: string, detail: string) {
		super(`Cannot parse ${filePath}: ${detail}`);
		this.name = "InvalidSettingsError";
		this.filePath = filePath;
	}
}

export class ManifestError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "ManifestError";
	}
}

export class BundleError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "BundleError";
	}
}
