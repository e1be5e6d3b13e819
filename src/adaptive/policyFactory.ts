import type { ClassifierHandle } from "../model/classifierHandle";
import { HybridArbiter } from "./hybridArbiter";
import { ProbabilisticPolicy } from "./probabilisticPolicy";
import { ThresholdPolicy } from "./thresholdPolicy";
import type { AdaptationMode, DifficultyPolicy } from "./types";

export const createPolicy = (mode: AdaptationMode, handle: ClassifierHandle): DifficultyPolicy => {
  switch (mode) {
    case 'rule_based':
      return new ThresholdPolicy();
    case 'ml_based':
      return new ProbabilisticPolicy(handle);
    case 'hybrid':
      return new HybridArbiter(new ProbabilisticPolicy(handle));
  }
};
