import { isMissingFile } from "../utils/fsErrors";
import { logger } from "../utils/logger";
import { readArtifact, type ClassifierArtifact } from "./artifact";
import { LogisticRegressionClassifier } from "./logisticRegression";
import type { SuccessClassifier } from "./types";

export type ClassifierState = 'uninitialized' | 'untrained' | 'ready';

export type ClassifierLoadResult =
  | { ok: true; artifact: ClassifierArtifact }
  | { ok: false; reason: 'artifact_missing' | 'artifact_invalid'; message: string };

export interface ClassifierStatus {
  state: ClassifierState;
  artifactPath: string | null;
  trainedAt: string | null;
  sampleCount: number | null;
  trainingAccuracy: number | null;
  lastLoadError: string | null;
}

/**
 * Owns the classifier used by the probabilistic policy. A handle makes at
 * most one load attempt; a failed attempt leaves it untrained for its
 * lifetime.
 */
export class ClassifierHandle {
  private state: ClassifierState = 'uninitialized';
  private classifier: SuccessClassifier | null = null;
  private artifact: ClassifierArtifact | null = null;
  private artifactPath: string | null = null;
  private lastLoadError: string | null = null;

  static ready(classifier: SuccessClassifier): ClassifierHandle {
    const handle = new ClassifierHandle();
    handle.classifier = classifier;
    handle.state = 'ready';
    return handle;
  }

  static untrained(): ClassifierHandle {
    const handle = new ClassifierHandle();
    handle.state = 'untrained';
    return handle;
  }

  static fromArtifact(artifact: ClassifierArtifact): ClassifierHandle {
    const handle = ClassifierHandle.ready(LogisticRegressionClassifier.fromArtifact(artifact));
    handle.artifact = artifact;
    return handle;
  }

  static async load(artifactPath: string): Promise<ClassifierHandle> {
    const handle = new ClassifierHandle();
    await handle.load(artifactPath);
    return handle;
  }

  async load(artifactPath: string): Promise<ClassifierLoadResult> {
    if (this.state !== 'uninitialized') {
      throw new Error(`Classifier handle already initialized (state: ${this.state})`);
    }

    this.artifactPath = artifactPath;

    try {
      const artifact = await readArtifact(artifactPath);
      this.classifier = LogisticRegressionClassifier.fromArtifact(artifact);
      this.artifact = artifact;
      this.state = 'ready';

      logger.info({
        artifactPath,
        trainedAt: artifact.trainedAt,
        sampleCount: artifact.sampleCount
      }, "classifier_loaded");

      return { ok: true, artifact };
    } catch (err: unknown) {
      this.state = 'untrained';
      const message = err instanceof Error ? err.message : String(err);
      this.lastLoadError = message;

      if (isMissingFile(err)) {
        logger.info({ artifactPath }, "classifier_artifact_missing");
        return { ok: false, reason: 'artifact_missing', message };
      }

      logger.warn({ err, artifactPath }, "classifier_load_failed");
      return { ok: false, reason: 'artifact_invalid', message };
    }
  }

  getState(): ClassifierState {
    return this.state;
  }

  isReady(): boolean {
    return this.state === 'ready' && this.classifier !== null;
  }

  /**
   * Throws when the handle is not ready or the classifier rejects the input.
   */
  predictProbability(features: readonly number[]): number {
    if (!this.classifier || this.state !== 'ready') {
      throw new Error(`Classifier not ready (state: ${this.state})`);
    }

    const probability = this.classifier.predictProbability(features);
    if (!Number.isFinite(probability) || probability < 0 || probability > 1) {
      throw new Error(`Classifier returned an invalid probability: ${probability}`);
    }
    return probability;
  }

  getStatus(): ClassifierStatus {
    return {
      state: this.state,
      artifactPath: this.artifactPath,
      trainedAt: this.artifact?.trainedAt ?? null,
      sampleCount: this.artifact?.sampleCount ?? null,
      trainingAccuracy: this.artifact?.trainingAccuracy ?? null,
      lastLoadError: this.lastLoadError
    };
  }
}
