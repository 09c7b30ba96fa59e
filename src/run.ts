/**
 * @fileoverview CLI runner for `ptusim`.
 */

import process from 'node:process';
import type { Args, Command } from 'gunshi';
import { cli } from 'gunshi';
import { description, name, version } from '../package.json';
import { analyzeCommand, overviewCommand, schemesCommand } from './commands/index.ts';

const subCommands = new Map<string, Command<Args>>([
	['analyze', analyzeCommand],
	['overview', overviewCommand],
	['schemes', schemesCommand],
]);

const mainCommand = analyzeCommand;

export async function run(): Promise<void> {
	// When invoked through npx, the binary name might be passed as the first argument
	let args = process.argv.slice(2);
	if (args[0] === name) {
		args = args.slice(1);
	}

	await cli(args, mainCommand, {
		name,
		version,
		description,
		subCommands,
		renderHeader: null,
	});
}
