#!/usr/bin/env npx tsx
/**
 * Plan a quiz session and print the question order
 *
 * Usage:
 *   npx tsx scripts/plan-session.ts <quiz> [options]
 *
 * Environment:
 *   DRILLBOOK_HOME   Directory with <quiz>.json files (default: ./quizzes)
 *
 * Options:
 *   --tag <glob>       Only questions with a matching tag (repeatable)
 *   --exclude <glob>   Skip questions with a matching tag (repeatable)
 *   --keyword <word>   Only questions whose text contains the word (repeatable)
 *   --never            Only questions never attempted
 *   -n <count>         Number of questions
 *   --seed <int>       Seed for a reproducible order
 *   --in-order         Keep definition order
 *   --flip             Swap prompt and answer of flashcards
 *   --best <n>, --worst <n>, --most <n>, --least <n>
 *                      Preselect by past results
 *   --help, -h         Show help
 */

import {flipFlashcards} from '../src/domain/quiz/loadQuiz';
import {RESULT_SORTS} from '../src/domain/history/types';
import type {ResultSort} from '../src/domain/history/types';
import {schedule} from '../src/domain/scheduling/sessionScheduler';
import type {ScheduleOptions, SessionFilterSet} from '../src/domain/scheduling/types';
import {getAllArgs, getIntArg, getPositional, getQuizHome, hasFlag, openQuiz} from './lib/cli-helpers';

const VALUE_FLAGS = ['--tag', '--exclude', '--keyword', '-n', '--seed', '--best', '--worst', '--most', '--least'];

function getSelection(args: string[]): ScheduleOptions['selection'] {
	const modes = RESULT_SORTS.filter((mode) => hasFlag(args, `--${mode}`));
	if (modes.length > 1) {
		throw new Error('Use only one of --best, --worst, --most, --least');
	}
	const mode: ResultSort | undefined = modes[0];
	if (mode === undefined) return undefined;

	const limit = getIntArg(args, `--${mode}`);
	if (limit === undefined) {
		throw new Error(`--${mode} expects a number of questions`);
	}
	return {mode, limit};
}

async function main() {
	const args = process.argv.slice(2);

	if (args.includes('--help') || args.includes('-h')) {
		console.log(`
Usage: npx tsx scripts/plan-session.ts <quiz> [--tag <glob>] [--exclude <glob>] [--keyword <word>]
       [--never] [-n <count>] [--seed <int>] [--in-order] [--flip] [--best|--worst|--most|--least <n>]
`);
		process.exit(0);
	}

	const name = getPositional(args, VALUE_FLAGS);
	if (!name) {
		throw new Error('Missing quiz name');
	}

	const home = getQuizHome();
	const {quiz, log} = await openQuiz(home, name);
	const questions = hasFlag(args, '--flip') ? flipFlashcards(quiz.questions) : quiz.questions;

	const filters: SessionFilterSet = {
		tags: getAllArgs(args, '--tag'),
		exclude: getAllArgs(args, '--exclude'),
		keywords: getAllArgs(args, '--keyword'),
		never: hasFlag(args, '--never'),
	};

	const session = schedule(questions, log, filters, getIntArg(args, '--seed'), {
		count: getIntArg(args, '-n'),
		selection: getSelection(args),
		inOrder: hasFlag(args, '--in-order'),
	});

	console.log(
		JSON.stringify(
			{
				id: session.id,
				seed: session.seed,
				questions: session.questions.map((question) => ({
					id: question.id,
					kind: question.kind,
					text: question.text[0],
				})),
			},
			null,
			2,
		),
	);

	console.error('');
	console.error('=== Session Plan ===');
	console.error(`Quiz: ${name} (${quiz.questions.length} questions)`);
	console.error(`Planned: ${session.questions.length}`);
	console.error(`Seed: ${session.seed}`);
}

main().catch((err) => {
	console.error('Error:', err.message);
	process.exit(1);
});
