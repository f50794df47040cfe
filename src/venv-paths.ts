import createDebug from 'debug';
import { pathExists } from 'fs-extra';
import { join, resolve } from 'node:path';
import type { ActivationShell, VenvPaths } from './types';

const debug = createDebug('venv-bootstrap:venv-paths');

// `$OSTYPE` values reported by the Windows ports of bash (Git Bash, MSYS2).
// Those shells do not export `OSTYPE`, but they do export `MSYSTEM`.
const windowsOsTypes = new Set(['msys', 'win32']);

export interface PlatformOptions {
	env?: NodeJS.ProcessEnv;
	platform?: NodeJS.Platform;
}

export function getVenvPaths(venvDir: string, windows: boolean): VenvPaths {
	if (windows) {
		return {
			venvDir,
			windows,
			binDir: `${venvDir}/Scripts`,
			activateScript: `${venvDir}/Scripts/activate`,
			python: `${venvDir}/Scripts/python.exe`
		};
	}
	return {
		venvDir,
		windows,
		binDir: `${venvDir}/bin`,
		activateScript: `${venvDir}/bin/activate`,
		python: `${venvDir}/bin/python`
	};
}

/**
 * A Windows layout is used under a Windows-style shell, or whenever the
 * environment tool already produced one.
 */
export async function isWindowsShell(
	projectDir: string,
	venvDir: string,
	{ env = process.env, platform = process.platform }: PlatformOptions = {}
): Promise<boolean> {
	const osType = env.OSTYPE;
	if (osType && windowsOsTypes.has(osType)) {
		debug('Detected Windows shell from OSTYPE=%o', osType);
		return true;
	}
	if (env.MSYSTEM) {
		debug('Detected Windows shell from MSYSTEM=%o', env.MSYSTEM);
		return true;
	}
	if (platform === 'win32') {
		return true;
	}
	return pathExists(join(projectDir, venvDir, 'Scripts', 'activate'));
}

export async function selectVenvPaths(
	projectDir: string,
	venvDir: string,
	opts: PlatformOptions = {}
): Promise<VenvPaths> {
	const windows = await isWindowsShell(projectDir, venvDir, opts);
	const paths = getVenvPaths(venvDir, windows);
	debug('Selected venv paths %o', paths);
	return paths;
}

/**
 * Does to `env` what sourcing the activation script does to a shell.
 */
export function activate(
	projectDir: string,
	paths: VenvPaths,
	env: NodeJS.ProcessEnv = process.env,
	platform: NodeJS.Platform = process.platform
): NodeJS.ProcessEnv {
	const delimiter = platform === 'win32' ? ';' : ':';
	const binDir = resolve(projectDir, paths.binDir);
	env.VIRTUAL_ENV = resolve(projectDir, paths.venvDir);
	env.PATH = env.PATH ? `${binDir}${delimiter}${env.PATH}` : binDir;
	delete env.PYTHONHOME;
	debug('Activated %o', env.VIRTUAL_ENV);
	return env;
}

export function activationShell(
	env: NodeJS.ProcessEnv = process.env,
	platform: NodeJS.Platform = process.platform
): ActivationShell {
	if (platform !== 'win32' || env.OSTYPE || env.MSYSTEM) {
		return 'posix';
	}
	return 'powershell';
}

export function activationCommand(
	paths: VenvPaths,
	shell: ActivationShell
): string {
	if (shell === 'powershell') {
		return `${paths.venvDir}\\Scripts\\Activate.ps1`;
	}
	return `source ${paths.activateScript}`;
}
