import "dotenv/config";

import { runTrainCli } from "../model/trainCli";
import { logger } from "../utils/logger";

runTrainCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    logger.error({ err }, "training_pipeline_failed");
    process.exitCode = 1;
  });
