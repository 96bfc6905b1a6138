export class SimulatorConfigurationError extends Error {
  readonly setting: string;

  constructor(setting: string, message?: string) {
    super(message ?? `Invalid simulator setting '${setting}'`);
    this.setting = setting;
    this.name = "SimulatorConfigurationError";
  }
}

export function assertCycleCount(setting: string, value: number): number {
  if (!Number.isInteger(value) || value < 0) {
    throw new SimulatorConfigurationError(setting, `${setting} must be a non-negative integer, got ${value}`);
  }
  return value;
}
