import ms from 'ms';
import createDebug from 'debug';
import { resolve } from 'node:path';
import type {
	BootstrapOptions,
	BootstrapResult,
	CommandRunner,
	Logger,
	StepTiming,
	VenvPaths
} from './types';
import { runCommand } from './run';
import { findExecutable } from './find-executable';
import { findProjectDir } from './project-dir';
import { MissingToolError, StepFailedError, exitCodeFor } from './errors';
import {
	activate,
	activationCommand,
	activationShell,
	selectVenvPaths
} from './venv-paths';

const debug = createDebug('venv-bootstrap:index');

export type {
	BootstrapOptions,
	BootstrapResult,
	CommandRunner,
	Logger,
	VenvPaths
};

export {
	MissingToolError,
	StepFailedError,
	exitCodeFor,
	findExecutable,
	findProjectDir,
	runCommand
};

export const defaults = {
	venvDir: '.venv',
	tool: 'uv',
	installHint: 'curl -LsSf https://astral.sh/uv/install.sh | sh',
	browser: 'chromium'
};

export async function bootstrap(
	options: BootstrapOptions = {}
): Promise<BootstrapResult> {
	const {
		venvDir = defaults.venvDir,
		tool = defaults.tool,
		installHint = defaults.installHint,
		browser = defaults.browser,
		env = process.env,
		platform = process.platform,
		log = console.log,
		run = runCommand
	} = options;
	const projectDir = resolve(options.projectDir || process.cwd());
	const timings: StepTiming[] = [];

	async function step(
		name: string,
		file: string,
		args: string[]
	): Promise<void> {
		const start = Date.now();
		await run(name, file, args, { cwd: projectDir, env });
		const duration = Date.now() - start;
		debug('%s took %s', name, ms(duration));
		timings.push({ step: name, duration });
	}

	log('[*] Setting up virtual environment...');
	debug('Project directory %o', projectDir);

	const toolPath = await findExecutable(tool, env, platform);
	if (!toolPath) {
		log(`[X] Error: ${tool} is not installed`);
		log(`[!] Please install ${tool} first: ${installHint}`);
		throw new MissingToolError(tool);
	}

	log('[*] Creating virtual environment...');
	await step('create-venv', toolPath, ['venv', venvDir]);

	const paths = await selectVenvPaths(projectDir, venvDir, { env, platform });

	log('[*] Activating virtual environment...');
	activate(projectDir, paths, env, platform);

	log('[*] Installing dependencies...');
	await step('install-project', toolPath, ['pip', 'install', '-e', '.']);

	log('[*] Installing Playwright browsers...');
	await step('install-browser', resolve(projectDir, paths.python), [
		'-m',
		'playwright',
		'install',
		browser
	]);

	const command = activationCommand(paths, activationShell(env, platform));
	log('[OK] Setup complete!');
	log('[*] To activate the virtual environment, run:');
	log(`    ${command}`);

	return {
		projectDir,
		toolPath,
		paths,
		activationCommand: command,
		timings
	};
}
