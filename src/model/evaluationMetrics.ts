export interface ConfusionCounts {
  truePositive: number;
  falsePositive: number;
  trueNegative: number;
  falseNegative: number;
}

export const confusionCounts = (actual: readonly (0 | 1)[], predicted: readonly (0 | 1)[]): ConfusionCounts => {
  if (actual.length !== predicted.length) {
    throw new Error("Label and prediction counts differ");
  }

  const counts: ConfusionCounts = { truePositive: 0, falsePositive: 0, trueNegative: 0, falseNegative: 0 };
  actual.forEach((label, i) => {
    const pred = predicted[i];
    if (label === 1 && pred === 1) counts.truePositive += 1;
    else if (label === 0 && pred === 1) counts.falsePositive += 1;
    else if (label === 0 && pred === 0) counts.trueNegative += 1;
    else counts.falseNegative += 1;
  });
  return counts;
};

// Undefined ratios (no predictions, no positives) score 0.
const safeRatio = (num: number, den: number): number => (den === 0 ? 0 : num / den);

export const accuracyScore = (c: ConfusionCounts): number => {
  const total = c.truePositive + c.falsePositive + c.trueNegative + c.falseNegative;
  return safeRatio(c.truePositive + c.trueNegative, total);
};

export const precisionScore = (c: ConfusionCounts): number => safeRatio(c.truePositive, c.truePositive + c.falsePositive);

export const recallScore = (c: ConfusionCounts): number => safeRatio(c.truePositive, c.truePositive + c.falseNegative);

export const f1Score = (c: ConfusionCounts): number => {
  const p = precisionScore(c);
  const r = recallScore(c);
  return safeRatio(2 * p * r, p + r);
};
