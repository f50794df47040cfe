export interface RunOptions {
	cwd: string;
	env: NodeJS.ProcessEnv;
}

// Runs one external command, rejecting with `StepFailedError` on a non-zero exit.
export type CommandRunner = (
	step: string,
	file: string,
	args: string[],
	opts: RunOptions
) => Promise<void>;

export type Logger = (line: string) => void;

export interface BootstrapOptions {
	projectDir?: string; // defaults to `process.cwd()`
	venvDir?: string; // defaults to `.venv`
	tool?: string; // defaults to `uv`
	installHint?: string; // printed when `tool` is missing
	browser?: string; // Playwright browser engine, defaults to `chromium`
	env?: NodeJS.ProcessEnv; // defaults to `process.env`, mutated by activation
	platform?: NodeJS.Platform;
	log?: Logger;
	run?: CommandRunner;
}

export interface VenvPaths {
	venvDir: string;
	windows: boolean;
	binDir: string;
	activateScript: string;
	python: string;
}

export type ActivationShell = 'posix' | 'powershell';

export interface StepTiming {
	step: string;
	duration: number;
}

export interface BootstrapResult {
	projectDir: string;
	toolPath: string;
	paths: VenvPaths;
	activationCommand: string;
	timings: StepTiming[];
}
