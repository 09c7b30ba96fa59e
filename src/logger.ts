/**
 * @fileoverview Logging utilities for ptusim
 *
 * Provides a consola logger tagged with the package name. The LOG_LEVEL
 * environment variable overrides the default level.
 *
 * @module logger
 */

import type { ConsolaInstance } from 'consola';
import process from 'node:process';
import { consola } from 'consola';
import { name } from '../package.json';

export function createLogger(tag: string): ConsolaInstance {
	const instance: ConsolaInstance = consola.withTag(tag);

	if (process.env.LOG_LEVEL != null) {
		const level = Number.parseInt(process.env.LOG_LEVEL, 10);
		if (!Number.isNaN(level)) {
			instance.level = level;
		}
	}

	return instance;
}

/**
 * Application logger instance with package name tag
 */
export const logger: ConsolaInstance = createLogger(name);

/**
 * Direct console.log function for report output
 */
// eslint-disable-next-line no-console
export const log = console.log;
