import createDebug from 'debug';
import { pathExists } from 'fs-extra';
import { dirname, join, resolve } from 'node:path';

const debug = createDebug('venv-bootstrap:project-dir');

export const manifestNames = ['pyproject.toml', 'setup.py', 'setup.cfg'];

async function hasManifest(dir: string): Promise<boolean> {
	for (const name of manifestNames) {
		if (await pathExists(join(dir, name))) {
			return true;
		}
	}
	return false;
}

/**
 * Walks up from `startDir` to the nearest directory holding a Python
 * project manifest. Falls back to `startDir` itself.
 */
export async function findProjectDir(startDir: string): Promise<string> {
	const start = resolve(startDir);
	let dir = start;
	for (;;) {
		if (await hasManifest(dir)) {
			debug('Found project manifest in %o', dir);
			return dir;
		}
		const parent = dirname(dir);
		if (parent === dir) {
			break;
		}
		dir = parent;
	}
	debug('No project manifest above %o', start);
	return start;
}
