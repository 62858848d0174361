/**
 * Shared helpers for scripts
 *
 * Reads the quiz home directory from the environment and parses the
 * small flag syntax the scripts share.
 */

import 'dotenv/config';
import {existsSync, readFileSync} from 'node:fs';
import {join, resolve} from 'node:path';
import {FileStorageAdapter} from '../../src/adapters/filesystem/FileStorageAdapter';
import {ResultLog} from '../../src/domain/history/ResultLog';
import {loadQuizFromJson} from '../../src/domain/quiz/loadQuiz';
import type {Quiz} from '../../src/domain/quiz/types';

/**
 * Directory holding quiz files and the results store
 */
export function getQuizHome(): string {
	return resolve(process.env.DRILLBOOK_HOME || './quizzes');
}

/**
 * Get a command line argument value
 *
 * @returns The argument value, or undefined if not found
 */
export function getArg(args: string[], name: string): string | undefined {
	const index = args.indexOf(name);
	if (index !== -1 && args[index + 1]) {
		return args[index + 1];
	}
	return undefined;
}

/**
 * Every value given for a repeatable flag (e.g. --tag a --tag b)
 */
export function getAllArgs(args: string[], name: string): string[] {
	const values: string[] = [];
	args.forEach((arg, index) => {
		const value = args[index + 1];
		if (arg === name && value !== undefined && !value.startsWith('-')) {
			values.push(value);
		}
	});
	return values;
}

export function hasFlag(args: string[], name: string): boolean {
	return args.includes(name);
}

/**
 * Parse an integer flag; undefined when absent
 */
export function getIntArg(args: string[], name: string): number | undefined {
	const raw = getArg(args, name);
	if (raw === undefined) return undefined;

	const value = Number.parseInt(raw, 10);
	if (!Number.isInteger(value) || value < 0) {
		throw new Error(`${name} expects a non-negative integer, got '${raw}'`);
	}
	return value;
}

/**
 * First argument that is neither a flag nor a flag's value
 */
export function getPositional(args: string[], valueFlags: readonly string[]): string | undefined {
	for (let i = 0; i < args.length; i++) {
		const arg = args[i];
		if (valueFlags.includes(arg)) {
			i++;
		} else if (!arg.startsWith('-')) {
			return arg;
		}
	}
	return undefined;
}

/**
 * Load <home>/<name>.json and the quiz's result log
 */
export async function openQuiz(home: string, name: string): Promise<{quiz: Quiz; log: ResultLog}> {
	const quizPath = join(home, `${name}.json`);
	if (!existsSync(quizPath)) {
		throw new Error(`Quiz file not found: ${quizPath}`);
	}

	const quiz = loadQuizFromJson(readFileSync(quizPath, 'utf-8'));
	const storage = new FileStorageAdapter(join(home, '.drillbook'));
	const log = await ResultLog.open(storage, name);
	return {quiz, log};
}
