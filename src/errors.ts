/**
 * Subclassing `Error` in TypeScript:
 * https://stackoverflow.com/a/41102306/376773
 */

export class MissingToolError extends Error {
	tool: string;

	constructor(tool: string) {
		super(`${tool} is not installed`);
		this.name = new.target.name;
		Object.setPrototypeOf(this, new.target.prototype);
		this.tool = tool;
	}
}

export class StepFailedError extends Error {
	step: string;
	exitCode: number;

	constructor(step: string, exitCode: number, cause?: Error) {
		super(`Step "${step}" failed with exit code ${exitCode}`);
		this.name = new.target.name;
		Object.setPrototypeOf(this, new.target.prototype);
		this.step = step;
		this.exitCode = exitCode;
		if (cause && cause.stack) {
			this.stack = `${this.name}: ${this.message}\nCaused by: ${cause.stack}`;
		}
	}
}

/**
 * Maps an error thrown by `bootstrap()` to the process exit code.
 */
export function exitCodeFor(err: unknown): number {
	if (err instanceof StepFailedError) {
		return err.exitCode;
	}
	return 1;
}
