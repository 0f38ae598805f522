/**
 * Homily Detector Configuration
 * Builds the boundary resolver from the environment. Construction runs the
 * marker self-check, so a bad HOMILY_MARKER stops the process at startup.
 */

import type { Env } from "./env.js";
import {
  HomilyBoundaryResolver,
  type DetectorOptions,
} from "../services/business/homily/boundaryResolver.js";

export function detectorOptionsFromEnv(env: Env): DetectorOptions {
  return {
    marker: env.HOMILY_MARKER,
    endStrategy: env.HOMILY_END_STRATEGY,
    startAt: env.HOMILY_START_AT,
    silenceThresholdSec: env.HOMILY_SILENCE_THRESHOLD_SEC,
  };
}

export function createBoundaryResolver(env: Env): HomilyBoundaryResolver {
  const options = detectorOptionsFromEnv(env);
  console.log(
    `[config] Homily marker '${options.marker}', end strategy ${options.endStrategy}` +
      (options.endStrategy === "silence-gap" ? ` (${options.silenceThresholdSec}s)` : "")
  );
  return new HomilyBoundaryResolver(options);
}
