import type { ConfigLayer } from "../config/loader.js";
import { ConfigError } from "../errors.js";

export type Command = "run" | "metrics";

export interface CliOptions {
  command: Command;
  flags: ConfigLayer;
  once: boolean;
  json: boolean;
  configPath?: string;
  help: boolean;
  version: boolean;
}

const VALUE_FLAGS = {
  "--style": ["canvas", "style"],
  "--width": ["canvas", "width"],
  "--height": ["canvas", "height"],
  "--seed": ["canvas", "seed"],
  "--interval": ["loop", "interval"],
} as const;

type ValueFlag = keyof typeof VALUE_FLAGS;

function isValueFlag(name: string): name is ValueFlag {
  return Object.hasOwn(VALUE_FLAGS, name);
}

export const USAGE = `Usage: metric-canvas [run|metrics] [options]

Terminal generative art driven by system metrics.

Commands:
  run                 Launch the generative art canvas (default)
  metrics             Print current system metrics as JSON

Options:
  --style <name>      Art style: plasma, waves, ember (default: plasma)
  --width <n>         Width of canvas (default: 80)
  --height <n>        Height of canvas (default: 24)
  --interval <ms>     Frame interval in milliseconds (default: 500)
  --seed <n>          Seed override for deterministic art
  --once              Render once, then print the snapshot and exit
  --json              Output a JSON snapshot instead of live art
  --config <path>     Read settings from a YAML file
  -h, --help          Show this help
  -V, --version       Show the version`;

export function parseArgs(argv: string[]): CliOptions {
  const options: CliOptions = {
    command: "run",
    flags: { canvas: {}, loop: {} },
    once: false,
    json: false,
    help: false,
    version: false,
  };
  let commandSeen = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? "";
    const eq = arg.indexOf("=");
    const name = arg.startsWith("--") && eq > 0 ? arg.slice(0, eq) : arg;
    const inline = arg.startsWith("--") && eq > 0 ? arg.slice(eq + 1) : undefined;

    const takeValue = (): string => {
      if (inline !== undefined) return inline;
      const value = argv[i + 1];
      if (value === undefined || value.startsWith("--")) {
        throw new ConfigError(`Missing value for ${name}`);
      }
      i++;
      return value;
    };

    if (name === "--help" || name === "-h") {
      options.help = true;
      continue;
    }
    if (name === "--version" || name === "-V") {
      options.version = true;
      continue;
    }
    if (name === "--once") {
      options.once = true;
      continue;
    }
    if (name === "--json") {
      options.json = true;
      continue;
    }
    if (name === "--config") {
      options.configPath = takeValue();
      continue;
    }
    if (isValueFlag(name)) {
      const [section, key] = VALUE_FLAGS[name];
      options.flags[section] = { ...options.flags[section], [key]: takeValue() };
      continue;
    }
    if (arg.startsWith("-")) {
      throw new ConfigError(`Unknown option: ${arg}`);
    }
    if (!commandSeen && (arg === "run" || arg === "metrics")) {
      options.command = arg;
      commandSeen = true;
      continue;
    }
    throw new ConfigError(`Unexpected argument: ${arg}`);
  }

  return options;
}
