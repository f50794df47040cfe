import createDebug from 'debug';
import { constants } from 'node:fs';
import { access, stat } from 'node:fs/promises';
import { delimiter as posixDelimiter, join } from 'node:path';

const debug = createDebug('venv-bootstrap:find-executable');

const DEFAULT_PATHEXT = '.EXE;.CMD;.BAT;.COM';

function errorCode(err: unknown): unknown {
	return err instanceof Error && 'code' in err ? err.code : err;
}

async function isExecutableFile(
	candidate: string,
	platform: NodeJS.Platform
): Promise<boolean> {
	try {
		const s = await stat(candidate);
		if (!s.isFile()) {
			return false;
		}
		if (platform !== 'win32') {
			await access(candidate, constants.X_OK);
		}
		return true;
	} catch (err) {
		debug('Skipping %o: %s', candidate, errorCode(err));
		return false;
	}
}

/**
 * Resolves `name` against the `PATH` of `env`, like `command -v` does.
 * Returns `null` if no executable file by that name is found.
 */
export async function findExecutable(
	name: string,
	env: NodeJS.ProcessEnv = process.env,
	platform: NodeJS.Platform = process.platform
): Promise<string | null> {
	const delimiter = platform === 'win32' ? ';' : posixDelimiter;
	const segments = (env.PATH || '').split(delimiter).filter(Boolean);
	const extensions =
		platform === 'win32'
			? (env.PATHEXT || DEFAULT_PATHEXT).split(';').filter(Boolean)
			: [''];

	for (const segment of segments) {
		for (const ext of extensions) {
			const candidate = join(segment, `${name}${ext}`);
			if (await isExecutableFile(candidate, platform)) {
				debug('Resolved %o to %o', name, candidate);
				return candidate;
			}
		}
	}
	debug('Could not find %o in %d PATH entries', name, segments.length);
	return null;
}
