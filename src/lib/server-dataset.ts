// Raw tables for the API routes: generated on first use, then shared
// read-only by every request in this process.

import { resolveServerGeneratorConfig } from "./config";
import { ConfigError, isValidationError } from "./errors";
import { generateTelemetryData } from "./telemetry-synth-engine";
import type { TelemetrySynthResult } from "./telemetry-synth-engine";

let dataset: TelemetrySynthResult | null = null;

function buildServerDataset(): TelemetrySynthResult {
  try {
    return generateTelemetryData(resolveServerGeneratorConfig());
  } catch (err) {
    if (isValidationError(err)) throw new ConfigError("Invalid telemetry server environment", err.issues);
    throw err;
  }
}

export function getServerDataset(): TelemetrySynthResult {
  if (!dataset) dataset = buildServerDataset();
  return dataset;
}

export function resetServerDataset(): void {
  dataset = null;
}
