import { env, type Env } from "../config/env";
import { ModelTrainer, type PipelineReport } from "./modelTrainer";
import { SessionLogStore } from "../sessions/sessionLogStore";

export interface TrainCliOptions {
  train: boolean;
  data: string;
  output: string;
  minSamples: number;
  help: boolean;
}

const USAGE = `Usage: train-model --train [--data=<sessions.json>] [--output=<artifact.json>] [--min-samples=<n>]

  --train          run the training pipeline
  --data           session log to learn from (default: SESSION_LOG_PATH)
  --output         where to write the classifier artifact (default: MODEL_ARTIFACT_PATH)
  --min-samples    refuse to train below this many examples (default: MIN_TRAINING_SAMPLES)`;

export type TrainDefaults = Pick<Env, "SESSION_LOG_PATH" | "MODEL_ARTIFACT_PATH" | "MIN_TRAINING_SAMPLES">;

export const parseTrainArgs = (argv: readonly string[], defaults: TrainDefaults = env): TrainCliOptions => {
  const options: TrainCliOptions = {
    train: false,
    data: defaults.SESSION_LOG_PATH,
    output: defaults.MODEL_ARTIFACT_PATH,
    minSamples: defaults.MIN_TRAINING_SAMPLES,
    help: false
  };

  for (const arg of argv) {
    const eq = arg.indexOf("=");
    const flag = eq === -1 ? arg : arg.slice(0, eq);
    const value = eq === -1 ? "" : arg.slice(eq + 1);
    if (flag === "--train") {
      options.train = true;
    } else if (flag === "--data" && value) {
      options.data = value;
    } else if (flag === "--output" && value) {
      options.output = value;
    } else if (flag === "--min-samples" && value) {
      const n = Number(value);
      if (!Number.isInteger(n) || n < 1) {
        throw new Error(`--min-samples must be a positive integer, received "${value}"`);
      }
      options.minSamples = n;
    } else if (flag === "--help" || flag === "-h") {
      options.help = true;
    } else {
      throw new Error(`Unknown argument: ${arg}`);
    }
  }

  return options;
};

const formatPercent = (value: number): string => `${(value * 100).toFixed(2)}%`;

const printReport = (report: PipelineReport): void => {
  console.log(`Sessions read: ${report.sessionsRead} (skipped ${report.sessionsSkipped} malformed)`);
  console.log(`Examples: ${report.exampleCount} (positive ${report.positiveCount}, negative ${report.negativeCount})`);

  if (!report.ok) {
    console.log(`Training not performed: ${report.failure ?? "unknown"}`);
    return;
  }

  if (report.metrics) {
    console.log(`Training accuracy: ${formatPercent(report.metrics.trainAccuracy)}`);
    console.log(`Test accuracy:     ${formatPercent(report.metrics.testAccuracy)}`);
    console.log(`Precision:         ${formatPercent(report.metrics.precision)}`);
    console.log(`Recall:            ${formatPercent(report.metrics.recall)}`);
    console.log(`F1:                ${formatPercent(report.metrics.f1)}`);
  }
  console.log(`Model saved to ${report.artifactPath ?? "(unknown)"}`);
};

export const runTrainCli = async (argv: readonly string[]): Promise<number> => {
  const options = parseTrainArgs(argv);

  if (options.help || !options.train) {
    console.log(USAGE);
    return options.help ? 0 : 1;
  }

  const trainer = new ModelTrainer(new SessionLogStore(options.data), {
    artifactPath: options.output,
    minSamples: options.minSamples
  });

  const report = await trainer.run();
  printReport(report);
  return report.ok ? 0 : 1;
};
