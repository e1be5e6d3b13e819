import fs from "fs/promises";
import path from "path";
import { z } from "zod";

import { FEATURE_NAMES } from "./types";

const vectorSchema = z.array(z.number().finite()).length(FEATURE_NAMES.length);

export const classifierArtifactSchema = z.object({
  format: z.literal("logistic-regression"),
  featureNames: z.array(z.enum(FEATURE_NAMES)).length(FEATURE_NAMES.length),
  weights: vectorSchema,
  intercept: z.number().finite(),
  featureMeans: vectorSchema,
  featureScales: vectorSchema.refine((scales) => scales.every((s) => s > 0), {
    message: "Feature scales must be positive"
  }),
  trainedAt: z.string().datetime(),
  sampleCount: z.number().int().positive(),
  trainingAccuracy: z.number().min(0).max(1)
});

export type ClassifierArtifact = z.infer<typeof classifierArtifactSchema>;

export const parseArtifact = (raw: string): ClassifierArtifact => {
  const json: unknown = JSON.parse(raw);
  const parsed = classifierArtifactSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
    throw new Error(`Invalid classifier artifact: ${issues}`);
  }
  return parsed.data;
};

export const readArtifact = async (artifactPath: string): Promise<ClassifierArtifact> => {
  const raw = await fs.readFile(artifactPath, "utf8");
  return parseArtifact(raw);
};

/**
 * Replaces any previous artifact at the same path.
 */
export const writeArtifact = async (artifactPath: string, artifact: ClassifierArtifact): Promise<void> => {
  await fs.mkdir(path.dirname(artifactPath), { recursive: true });
  const tmp = `${artifactPath}.tmp`;
  await fs.writeFile(tmp, JSON.stringify(artifact, null, 2) + "\n", "utf8");
  await fs.rename(tmp, artifactPath);
};
