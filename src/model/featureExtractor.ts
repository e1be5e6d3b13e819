import type { AnswerEvent } from "../adaptive/types";
import type { FeatureVector, TrainingExample } from "./types";

const RECENT_WINDOW = 3;
export const MIN_SESSION_LENGTH = 3;

type AnswerOutcome = Pick<AnswerEvent, 'isCorrect' | 'responseTimeSeconds'>;

const percentCorrect = (answers: readonly AnswerOutcome[]): number => {
  if (answers.length === 0) return 0;
  return (answers.filter(a => a.isCorrect).length / answers.length) * 100;
};

const trailingCorrectRun = (answers: readonly AnswerOutcome[]): number => {
  let run = 0;
  for (let i = answers.length - 1; i >= 0; i--) {
    if (!answers[i]?.isCorrect) break;
    run += 1;
  }
  return run;
};

/**
 * Features describing everything the learner did before the next answer.
 */
export const featuresFromPrefix = (prior: readonly AnswerOutcome[]): FeatureVector => {
  const recent = prior.slice(-RECENT_WINDOW);
  const avgRecentResponseTime = recent.length === 0
    ? 0
    : recent.reduce((acc, a) => acc + a.responseTimeSeconds, 0) / recent.length;

  return [
    percentCorrect(prior),
    avgRecentResponseTime,
    trailingCorrectRun(prior),
    percentCorrect(recent)
  ];
};

/**
 * One example per answer from the third onwards, labelled by whether that
 * answer was correct. Shorter sessions yield nothing.
 */
export const extractSessionExamples = (answers: readonly AnswerOutcome[]): TrainingExample[] => {
  if (answers.length < MIN_SESSION_LENGTH) return [];

  const examples: TrainingExample[] = [];
  for (let i = MIN_SESSION_LENGTH - 1; i < answers.length; i++) {
    examples.push({
      features: featuresFromPrefix(answers.slice(0, i)),
      label: answers[i]?.isCorrect ? 1 : 0
    });
  }
  return examples;
};

export const extractTrainingExamples = (sessions: readonly (readonly AnswerOutcome[])[]): TrainingExample[] => {
  return sessions.flatMap(answers => extractSessionExamples(answers));
};
