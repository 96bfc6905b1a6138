import { assemble } from "../core/assembler/Assembler";
import { initialSimulatorSettings, type SimulatorSettings } from "../core/config/SimulatorSettings";
import { SimulatorConfigurationError } from "../core/exceptions/ExecutionExceptions";
import { isPredictorMode } from "../core/pipeline/BranchPredictor";
import { DEFAULT_DRAIN_LIMIT, PipelineSimulator } from "../core/pipeline/PipelineSimulator";
import { formatTraceCsv } from "../core/tools/traceExport";

export interface RunArguments {
  file: string;
  settings: SimulatorSettings;
  /** Fixed cycle count; when null the program runs until the pipeline drains. */
  cycles: number | null;
  csv: boolean;
  memory: Array<{ address: number; value: number }>;
}

export const USAGE =
  "usage: run-program <file.asm> [--no-forwarding] [--structural] [--predictor none|static_nt|onebit] " +
  "[--cycles <n>] [--mem <address>=<value>] [--csv]";

function parseInteger(flag: string, text: string | undefined): number {
  const value = text === undefined ? Number.NaN : Number(text);
  if (!Number.isInteger(value)) {
    throw new SimulatorConfigurationError(flag, `${flag} expects an integer, got '${text ?? ""}'`);
  }
  return value;
}

export function parseRunArguments(argv: readonly string[]): RunArguments {
  const settings = { ...initialSimulatorSettings };
  const memory: RunArguments["memory"] = [];
  let file: string | null = null;
  let cycles: number | null = null;
  let csv = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case "--no-forwarding":
        settings.forwardingEnabled = false;
        break;
      case "--structural":
        settings.structuralHazardsEnabled = true;
        break;
      case "--predictor": {
        const mode = argv[++i];
        if (!isPredictorMode(mode)) {
          throw new SimulatorConfigurationError("--predictor", `Unknown predictor mode '${mode ?? ""}'`);
        }
        settings.predictorMode = mode;
        break;
      }
      case "--cycles":
        cycles = parseInteger(arg, argv[++i]);
        break;
      case "--mem": {
        const [address, value] = (argv[++i] ?? "").split("=");
        memory.push({ address: parseInteger(arg, address), value: parseInteger(arg, value) });
        break;
      }
      case "--csv":
        csv = true;
        break;
      default:
        if (arg.startsWith("--") || file !== null) {
          throw new SimulatorConfigurationError(arg, `Unexpected argument '${arg}'\n${USAGE}`);
        }
        file = arg;
    }
  }

  if (file === null) {
    throw new SimulatorConfigurationError("file", USAGE);
  }

  return { file, settings, cycles, csv, memory };
}

/** Assembles and runs a program, returning the text the command prints. */
export function runProgram(source: string, args: RunArguments): string {
  const simulator = new PipelineSimulator({ ...args.settings, program: assemble(source) });
  args.memory.forEach(({ address, value }) => simulator.writeMemory(address, value));

  if (args.cycles === null) {
    simulator.runUntilDrained(DEFAULT_DRAIN_LIMIT);
  } else {
    simulator.run(args.cycles);
  }

  if (args.csv) {
    return formatTraceCsv(simulator.getTrace());
  }

  const stats = simulator.getStatistics();
  const registers = simulator
    .getRegisters()
    .map((value, index) => ({ index, value }))
    .filter(({ index, value }) => index !== 0 && value !== 0)
    .map(({ index, value }) => `x${index}=${value}`);
  const memory = simulator.getMemoryEntries().map(({ address, value }) => `[${address}]=${value}`);
  const stallReasons = simulator.getStallBreakdown().map(({ reason, count }) => `${reason}: ${count}`);

  return [
    `cycles: ${stats.cycleCount}`,
    `retired: ${stats.retired}`,
    `stalls: ${stats.stalls}`,
    `flushes: ${stats.flushes}`,
    `mispredicts: ${stats.mispredicts}`,
    `CPI: ${stats.retired === 0 ? "n/a" : stats.cpi.toFixed(2)}`,
    `stall reasons: ${stallReasons.length === 0 ? "none" : stallReasons.join(", ")}`,
    `registers: ${registers.length === 0 ? "all zero" : registers.join(" ")}`,
    `memory: ${memory.length === 0 ? "empty" : memory.join(" ")}`,
  ].join("\n");
}
