/**
 * Session Recorder
 *
 * Grades answers for one sitting and makes each record durable before the
 * caller moves on to the next prompt.
 */

import { grade } from '@/domain/grading/grade';
import { classifyScore } from '@/domain/grading/gradingPolicy';
import type { GradeOptions, GradeResult, Submission } from '@/domain/grading/types';
import type { ResultLog } from '@/domain/history/ResultLog';
import type { AttemptRecord } from '@/domain/history/types';
import type { Question } from '@/domain/quiz/types';
import type { QuizSession } from '@/domain/scheduling/types';
import type { MonotonicClock } from './clock';
import { performanceClock } from './clock';

export interface SessionRecorderOptions {
  clock?: MonotonicClock;
  /** Wall clock for record timestamps, epoch milliseconds */
  wallClock?: () => number;
}

/**
 * Running aggregate of a sitting. Ungraded answers are kept out of the
 * correctness counts and the score.
 */
export interface SessionSummary {
  total: number;
  answered: number;
  correct: number;
  partial: number;
  incorrect: number;
  ungraded: number;
  /** Mean graded score, null before any graded answer */
  score: number | null;
}

interface AnsweredEntry {
  questionId: string;
  score: number | null;
}

export class SessionRecorder {
  private readonly clock: MonotonicClock;
  private readonly wallClock: () => number;
  private readonly presentedAt = new Map<string, number>();
  private readonly answered: AnsweredEntry[] = [];

  constructor(
    readonly session: QuizSession,
    private readonly log: ResultLog,
    options: SessionRecorderOptions = {},
  ) {
    this.clock = options.clock ?? performanceClock;
    this.wallClock = options.wallClock ?? Date.now;
  }

  /**
   * Start the answer timer for a prompt
   */
  present(question: Question): void {
    this.presentedAt.set(question.id, this.clock.now());
  }

  /**
   * Grade a submission, append its record and wait until it is durable.
   * The tally only changes after the append succeeded.
   */
  async submit(question: Question, submitted: Submission, options: GradeOptions = {}): Promise<GradeResult> {
    const started = this.presentedAt.get(question.id);
    const elapsedSeconds = started === undefined ? 0 : Math.max(0, (this.clock.now() - started) / 1000);
    const result = grade(question, submitted, elapsedSeconds, options);

    const record: AttemptRecord = {
      questionId: question.id,
      timestamp: this.wallClock(),
      score: result.score,
      elapsedSeconds,
      isCorrection: false,
      response: typeof submitted === 'string' ? submitted : [...submitted],
    };
    if (result.timedOut) record.timedOut = true;

    await this.log.append(record);

    this.presentedAt.delete(question.id);
    this.answered.push({ questionId: question.id, score: result.score });
    return result;
  }

  /**
   * Override the last graded answer with full credit.
   *
   * @returns The corrective record, or null when there is no graded answer
   * to correct or it already had full credit
   */
  async markPreviousCorrect(): Promise<AttemptRecord | null> {
    const previous = [...this.answered].reverse().find((entry) => entry.score !== null);
    if (!previous || previous.score === 1) return null;

    const record = await this.log.recordOverride(previous.questionId, 1, this.wallClock());
    previous.score = 1;
    return record;
  }

  summary(): SessionSummary {
    const counts = { correct: 0, partial: 0, incorrect: 0, ungraded: 0 };
    const scores: number[] = [];

    for (const entry of this.answered) {
      counts[classifyScore(entry.score)]++;
      if (entry.score !== null) scores.push(entry.score);
    }

    return {
      total: this.session.questions.length,
      answered: this.answered.length,
      ...counts,
      score: scores.length === 0 ? null : scores.reduce((sum, score) => sum + score, 0) / scores.length,
    };
  }
}
