import { isPredictorMode, type PredictorMode } from "../pipeline/BranchPredictor";

export interface SimulatorSettings {
  forwardingEnabled: boolean;
  structuralHazardsEnabled: boolean;
  predictorMode: PredictorMode;
}

export const initialSimulatorSettings: SimulatorSettings = {
  forwardingEnabled: true,
  structuralHazardsEnabled: false,
  predictorMode: "none",
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Merges a serialized settings document over the defaults. Fields with the
 * wrong type are ignored; unparseable input yields the defaults.
 */
export function parseSimulatorSettings(serialized: string | null | undefined): SimulatorSettings {
  if (!serialized) return { ...initialSimulatorSettings };

  let parsed: unknown;
  try {
    parsed = JSON.parse(serialized);
  } catch (error) {
    console.warn("Failed to parse simulator settings; falling back to defaults", error);
    return { ...initialSimulatorSettings };
  }

  if (!isRecord(parsed)) {
    console.warn("Simulator settings must be a JSON object; falling back to defaults");
    return { ...initialSimulatorSettings };
  }

  const settings = { ...initialSimulatorSettings };
  if (typeof parsed.forwardingEnabled === "boolean") settings.forwardingEnabled = parsed.forwardingEnabled;
  if (typeof parsed.structuralHazardsEnabled === "boolean") {
    settings.structuralHazardsEnabled = parsed.structuralHazardsEnabled;
  }
  if (parsed.predictorMode !== undefined) {
    if (isPredictorMode(parsed.predictorMode)) {
      settings.predictorMode = parsed.predictorMode;
    } else {
      console.warn(`Ignoring unknown predictor mode ${JSON.stringify(parsed.predictorMode)}`);
    }
  }
  return settings;
}

export function serializeSimulatorSettings(settings: SimulatorSettings): string {
  return JSON.stringify(settings);
}
