#!/usr/bin/env npx tsx
/**
 * Show per-question results for a quiz
 *
 * Usage:
 *   npx tsx scripts/show-results.ts <quiz> [options]
 *
 * Environment:
 *   DRILLBOOK_HOME   Directory with <quiz>.json files (default: ./quizzes)
 *
 * Options:
 *   --sort <order>   best, worst, most or least (default: worst)
 *   -n <count>       Limit the number of rows
 *   --tags           Also list tags with their question counts
 *   --help, -h       Show help
 */

import {summarizeResults} from '../src/domain/history/summarizeResults';
import {RESULT_SORTS} from '../src/domain/history/types';
import {listTags} from '../src/domain/scheduling/filters';
import {getArg, getIntArg, getPositional, getQuizHome, hasFlag, openQuiz} from './lib/cli-helpers';

function formatScore(score: number | null): string {
	return score === null ? '   -' : `${Math.round(score * 100)}%`.padStart(4);
}

async function main() {
	const args = process.argv.slice(2);

	if (args.includes('--help') || args.includes('-h')) {
		console.log(`
Usage: npx tsx scripts/show-results.ts <quiz> [--sort best|worst|most|least] [-n <count>] [--tags]
`);
		process.exit(0);
	}

	const name = getPositional(args, ['--sort', '-n']);
	if (!name) {
		throw new Error('Missing quiz name');
	}

	const sortArg = getArg(args, '--sort') ?? 'worst';
	const sort = RESULT_SORTS.find((mode) => mode === sortArg);
	if (!sort) {
		throw new Error(`--sort expects one of ${RESULT_SORTS.join(', ')}, got '${sortArg}'`);
	}

	const {quiz, log} = await openQuiz(getQuizHome(), name);
	const rows = summarizeResults(quiz.questions, log, sort, getIntArg(args, '-n'));

	if (rows.length === 0) {
		console.error(`No results recorded for '${name}'`);
	}
	for (const row of rows) {
		console.log(`${formatScore(row.score)}  ${String(row.attempts).padStart(3)}x  ${row.text}`);
	}

	if (hasFlag(args, '--tags')) {
		console.log('');
		for (const {tag, count} of listTags(quiz.questions)) {
			console.log(`${String(count).padStart(4)}  ${tag}`);
		}
	}
}

main().catch((err) => {
	console.error('Error:', err.message);
	process.exit(1);
});
