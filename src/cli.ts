#!/usr/bin/env node
import createDebug from 'debug';
import {
	MissingToolError,
	bootstrap,
	exitCodeFor,
	findProjectDir
} from './index';

const debug = createDebug('venv-bootstrap:cli');

export async function main(scriptDir: string = __dirname): Promise<number> {
	try {
		// Relative paths resolve against the project, not the caller's cwd
		const projectDir = await findProjectDir(scriptDir);
		process.chdir(projectDir);
		await bootstrap({ projectDir });
		return 0;
	} catch (err) {
		debug('Bootstrap failed %o', err);
		// The missing-tool diagnostic has already been printed
		if (err instanceof Error && !(err instanceof MissingToolError)) {
			console.error(`[X] ${err.message}`);
		}
		return exitCodeFor(err);
	}
}

if (require.main === module) {
	main().then(code => {
		process.exitCode = code;
	});
}
