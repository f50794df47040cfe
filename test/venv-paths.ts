import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import {
	activate,
	activationCommand,
	activationShell,
	getVenvPaths,
	isWindowsShell,
	selectVenvPaths
} from '../src/venv-paths';
import { cleanTempDirs, makeTempDir } from './helpers/tmp';

afterEach(cleanTempDirs);

it('venv_paths_posix', () => {
	expect(getVenvPaths('.venv', false)).toEqual({
		venvDir: '.venv',
		windows: false,
		binDir: '.venv/bin',
		activateScript: '.venv/bin/activate',
		python: '.venv/bin/python'
	});
});

it('venv_paths_windows', () => {
	expect(getVenvPaths('.venv', true)).toEqual({
		venvDir: '.venv',
		windows: true,
		binDir: '.venv/Scripts',
		activateScript: '.venv/Scripts/activate',
		python: '.venv/Scripts/python.exe'
	});
});

it('windows_shell_from_ostype', async () => {
	const dir = await makeTempDir('venv-ostype');
	const opts = { platform: 'linux' as const };
	expect(await isWindowsShell(dir, '.venv', { ...opts, env: { OSTYPE: 'msys' } })).toBe(true);
	expect(await isWindowsShell(dir, '.venv', { ...opts, env: { OSTYPE: 'win32' } })).toBe(true);
	expect(await isWindowsShell(dir, '.venv', { ...opts, env: { OSTYPE: 'linux-gnu' } })).toBe(false);
	expect(await isWindowsShell(dir, '.venv', { ...opts, env: {} })).toBe(false);
});

it('windows_shell_from_msystem', async () => {
	const dir = await makeTempDir('venv-msystem');
	const env = { MSYSTEM: 'MINGW64', SHELL: '/usr/bin/bash' };
	expect(await isWindowsShell(dir, '.venv', { env, platform: 'linux' })).toBe(true);
	const paths = await selectVenvPaths(dir, '.venv', { env, platform: 'win32' });
	expect(activationCommand(paths, activationShell(env, 'win32'))).toBe(
		'source .venv/Scripts/activate'
	);
});

it('windows_shell_from_platform', async () => {
	const dir = await makeTempDir('venv-platform');
	expect(await isWindowsShell(dir, '.venv', { env: {}, platform: 'win32' })).toBe(true);
});

it('windows_shell_from_existing_layout', async () => {
	const dir = await makeTempDir('venv-layout');
	await mkdir(join(dir, '.venv', 'Scripts'), { recursive: true });
	await writeFile(join(dir, '.venv', 'Scripts', 'activate'), '');
	const paths = await selectVenvPaths(dir, '.venv', { env: {}, platform: 'linux' });
	expect(paths.windows).toBe(true);
	expect(paths.python).toBe('.venv/Scripts/python.exe');
});

it('activate_env', () => {
	const env: NodeJS.ProcessEnv = { PATH: '/usr/bin', PYTHONHOME: '/opt/python' };
	const result = activate('/work/project', getVenvPaths('.venv', false), env, 'linux');
	expect(result).toBe(env);
	expect(env.VIRTUAL_ENV).toBe('/work/project/.venv');
	expect(env.PATH).toBe('/work/project/.venv/bin:/usr/bin');
	expect('PYTHONHOME' in env).toBe(false);
});

it('activate_env_without_path', () => {
	const env: NodeJS.ProcessEnv = {};
	activate('/work/project', getVenvPaths('env', false), env, 'linux');
	expect(env.PATH).toBe('/work/project/env/bin');
});

it('activation_shell', () => {
	expect(activationShell({}, 'linux')).toBe('posix');
	expect(activationShell({}, 'win32')).toBe('powershell');
	expect(activationShell({ OSTYPE: 'msys' }, 'win32')).toBe('posix');
	expect(activationShell({ MSYSTEM: 'MINGW64' }, 'win32')).toBe('posix');
	expect(activationShell({ MSYSTEM: 'MSYS' }, 'win32')).toBe('posix');
});

it('activation_command', () => {
	expect(activationCommand(getVenvPaths('.venv', false), 'posix')).toBe(
		'source .venv/bin/activate'
	);
	expect(activationCommand(getVenvPaths('.venv', true), 'posix')).toBe(
		'source .venv/Scripts/activate'
	);
	expect(activationCommand(getVenvPaths('.venv', true), 'powershell')).toBe(
		'.venv\\Scripts\\Activate.ps1'
	);
});
