#!/usr/bin/env node

import { checkManifest, formatCheckResultsJson, formatCheckResults } from './check.js';
import { loadOptionalConfig } from './dx/config.js';
import { isTraceEnabled } from './dx/trace.js';
import { errorMessage } from './errors.js';

function hasFlag(argv: string[], name: string): boolean {
	return argv.includes(name);
}

function getFlagValue(argv: string[], name: string): string | undefined {
	const idx = argv.indexOf(name);
	if (idx === -1) return undefined;
	return argv[idx + 1];
}

function usage() {
	console.log(`scriptlink

Usage:
	scriptlink check <manifest.json> [--json] [--ext <extension>]

Examples:
	npx scriptlink check scriptlink.json
	npx scriptlink check scripts/scriptlink.json --json

Notes:
	- check validates every declared function and resolves script paths; no engine is started
	- Exit code 1 when any function fails to link
	- Set SCRIPTLINK_DEBUG=1 for debug logs, SCRIPTLINK_TRACE=1 for trace events
`);
}

async function main() {
	const argv = process.argv;
	const [, , cmd, arg] = argv;

	if (!cmd || cmd === '-h' || cmd === '--help') {
		usage();
		process.exit(0);
	}

	if (cmd === 'check') {
		if (!arg || arg.startsWith('--')) {
			console.error('Missing manifest path (ex: scriptlink.json)');
			usage();
			process.exit(1);
		}

		const config = await loadOptionalConfig(process.cwd());
		const results = checkManifest(arg, {
			scriptExtension: getFlagValue(argv, '--ext') ?? config?.scriptExtension,
			tempDir: config?.tempDir,
		});

		if (hasFlag(argv, '--json')) console.log(formatCheckResultsJson(results));
		else console.log(formatCheckResults(results));

		process.exit(results.every((r) => r.ok) ? 0 : 1);
	}

	console.error(`Unknown command: ${cmd}`);
	usage();
	process.exit(1);
}

main().catch((err: unknown) => {
	// eslint-disable-next-line no-console
	console.error('[scriptlink]', errorMessage(err));
	if (isTraceEnabled()) {
		// eslint-disable-next-line no-console
		console.error(err);
	}
	process.exit(1);
});
