import type { SessionLogStore } from "../sessions/sessionLogStore";
import { logger } from "../utils/logger";
import { writeArtifact, type ClassifierArtifact } from "./artifact";
import {
  accuracyScore,
  confusionCounts,
  f1Score,
  precisionScore,
  recallScore
} from "./evaluationMetrics";
import { extractTrainingExamples } from "./featureExtractor";
import {
  fitLogisticRegression,
  type LogisticRegressionClassifier,
  type LogisticRegressionOptions
} from "./logisticRegression";
import type { EvaluationMetrics, TrainingExample } from "./types";

export type TrainingResult =
  | {
      ok: true;
      classifier: LogisticRegressionClassifier;
      artifact: ClassifierArtifact;
      trainingAccuracy: number;
    }
  | { ok: false; reason: 'empty_training_set' };

export const trainClassifier = (
  examples: readonly TrainingExample[],
  options: LogisticRegressionOptions = {},
  now: () => Date = () => new Date()
): TrainingResult => {
  if (examples.length === 0) {
    logger.warn("training_rejected_empty_set");
    return { ok: false, reason: 'empty_training_set' };
  }

  const classifier = fitLogisticRegression(examples, options);
  const trainingAccuracy = classifier.score(examples);
  const artifact = classifier.toArtifact({
    trainedAt: now().toISOString(),
    sampleCount: examples.length,
    trainingAccuracy
  });

  return { ok: true, classifier, artifact, trainingAccuracy };
};

export const HOLDOUT_EVERY = 5;

/**
 * Every fifth example is held out, giving an 80/20 split that does not
 * depend on a random seed.
 */
export const splitExamples = (
  examples: readonly TrainingExample[]
): { train: TrainingExample[]; test: TrainingExample[] } => {
  const train: TrainingExample[] = [];
  const test: TrainingExample[] = [];
  examples.forEach((ex, i) => {
    if (i % HOLDOUT_EVERY === HOLDOUT_EVERY - 1) test.push(ex);
    else train.push(ex);
  });
  return { train, test };
};

export const evaluateClassifier = (
  classifier: LogisticRegressionClassifier,
  train: readonly TrainingExample[],
  test: readonly TrainingExample[]
): EvaluationMetrics => {
  const counts = confusionCounts(
    test.map(ex => ex.label),
    test.map(ex => classifier.predict(ex.features))
  );

  return {
    trainAccuracy: classifier.score(train),
    testAccuracy: accuracyScore(counts),
    precision: precisionScore(counts),
    recall: recallScore(counts),
    f1: f1Score(counts),
    trainCount: train.length,
    testCount: test.length
  };
};

export type PipelineFailure = 'no_sessions' | 'insufficient_samples' | 'empty_training_set';

export interface PipelineReport {
  ok: boolean;
  failure?: PipelineFailure;
  sessionsRead: number;
  sessionsSkipped: number;
  exampleCount: number;
  positiveCount: number;
  negativeCount: number;
  metrics?: EvaluationMetrics;
  artifactPath?: string;
}

export interface ModelTrainerOptions {
  artifactPath: string;
  minSamples: number;
  regression?: LogisticRegressionOptions;
}

export class ModelTrainer {
  constructor(
    private readonly sessionLog: SessionLogStore,
    private readonly options: ModelTrainerOptions
  ) {}

  async run(): Promise<PipelineReport> {
    const { sessions, skipped } = await this.sessionLog.readSessions();
    logger.info({ sessions: sessions.length, skipped, source: this.sessionLog.getPath() }, "training_data_loaded");

    const report: PipelineReport = {
      ok: false,
      sessionsRead: sessions.length,
      sessionsSkipped: skipped,
      exampleCount: 0,
      positiveCount: 0,
      negativeCount: 0
    };

    if (sessions.length === 0) {
      return { ...report, failure: 'no_sessions' };
    }

    const examples = extractTrainingExamples(
      sessions.map(s => s.responses.map(r => ({ isCorrect: r.isCorrect, responseTimeSeconds: r.responseTime })))
    );
    report.exampleCount = examples.length;
    report.positiveCount = examples.filter(ex => ex.label === 1).length;
    report.negativeCount = examples.length - report.positiveCount;

    logger.info({
      examples: examples.length,
      positive: report.positiveCount,
      negative: report.negativeCount
    }, "training_examples_extracted");

    if (examples.length < this.options.minSamples) {
      logger.warn({ examples: examples.length, minSamples: this.options.minSamples }, "training_insufficient_samples");
      return { ...report, failure: 'insufficient_samples' };
    }

    const { train, test } = splitExamples(examples);
    const result = trainClassifier(train, this.options.regression);
    if (!result.ok) {
      return { ...report, failure: result.reason };
    }

    const metrics = evaluateClassifier(result.classifier, train, test);
    logger.info({ ...metrics }, "training_evaluated");

    await writeArtifact(this.options.artifactPath, result.artifact);
    logger.info({ artifactPath: this.options.artifactPath }, "classifier_artifact_saved");

    return { ...report, ok: true, metrics, artifactPath: this.options.artifactPath };
  }
}
