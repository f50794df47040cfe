import ms from 'ms';
import execa from 'execa';
import createDebug from 'debug';
import { constants } from 'node:os';
import { StepFailedError } from './errors';
import type { CommandRunner, RunOptions } from './types';

const debug = createDebug('venv-bootstrap:run');

// Shell conventions: 128+n for a signal, 127 not found, 126 not executable
const signalNumbers = new Map<string, number>(Object.entries(constants.signals));

function exitCodeOf(err: unknown): number {
	if (typeof err !== 'object' || err === null) {
		return 1;
	}
	if (
		'exitCode' in err &&
		typeof err.exitCode === 'number' &&
		err.exitCode !== 0
	) {
		return err.exitCode;
	}
	if ('signal' in err && typeof err.signal === 'string') {
		const n = signalNumbers.get(err.signal);
		if (n !== undefined) {
			return 128 + n;
		}
	}
	if ('code' in err) {
		if (err.code === 'ENOENT') {
			return 127;
		}
		if (err.code === 'EACCES') {
			return 126;
		}
	}
	return 1;
}

export const runCommand: CommandRunner = async function runCommand(
	step: string,
	file: string,
	args: string[],
	{ cwd, env }: RunOptions
): Promise<void> {
	debug('Exec %o in %o', `${file} ${args.join(' ')}`, cwd);
	const start = Date.now();
	try {
		await execa(file, args, {
			cwd,
			env,
			extendEnv: false,
			stdio: 'inherit'
		});
	} catch (err) {
		const code = exitCodeOf(err);
		debug('Step %o exited with code %d', step, code);
		throw new StepFailedError(
			step,
			code,
			err instanceof Error ? err : undefined
		);
	}
	debug('Step %o finished in %s', step, ms(Date.now() - start));
};
