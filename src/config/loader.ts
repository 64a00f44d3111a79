import { readFileSync, existsSync } from "fs";
import { resolve } from "path";
import yaml from "js-yaml";
import { ConfigError } from "../errors.js";
import { DEFAULT_STYLE, STYLE_NAMES, isStyleName, type StyleName } from "../render/styles.js";

export interface CanvasConfig {
  width: number;
  height: number;
  style: StyleName;
  seed?: number;
}

export interface LoopConfig {
  interval: number;
}

export interface Config {
  canvas: CanvasConfig;
  loop: LoopConfig;
}

type RawSection = Record<string, unknown>;

/** One unvalidated source of settings: defaults, a YAML file, the environment or CLI flags. */
export interface ConfigLayer {
  canvas?: RawSection;
  loop?: RawSection;
}

const MAX_DIMENSION = 65535;

export const defaultConfig: Config = {
  canvas: {
    width: 80,
    height: 24,
    style: DEFAULT_STYLE,
  },
  loop: {
    interval: 500,
  },
};

function isRecord(value: unknown): value is RawSection {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toSection(value: unknown, label: string): RawSection | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!isRecord(value)) {
    throw new ConfigError(`${label} must be a mapping`);
  }
  return value;
}

export function parseConfigLayer(loaded: unknown, source: string): ConfigLayer {
  if (loaded === undefined || loaded === null) {
    return {};
  }
  if (!isRecord(loaded)) {
    throw new ConfigError(`${source}: expected a mapping at the top level`);
  }
  return {
    canvas: toSection(loaded.canvas, `${source}: canvas`),
    loop: toSection(loaded.loop, `${source}: loop`),
  };
}

export function loadConfigFile(configPath?: string): ConfigLayer {
  const paths = configPath
    ? [resolve(process.cwd(), configPath)]
    : [
        resolve(process.cwd(), "config/default.yaml"),
        resolve(process.cwd(), "config.yaml"),
      ];

  for (const path of paths) {
    if (existsSync(path)) {
      let loaded: unknown;
      try {
        loaded = yaml.load(readFileSync(path, "utf-8"));
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new ConfigError(`Error loading config from ${path}: ${reason}`);
      }
      console.error(`[Config] Loaded configuration from ${path}`);
      return parseConfigLayer(loaded, path);
    }
  }

  if (configPath) {
    throw new ConfigError(`Config file not found: ${configPath}`);
  }
  return {};
}

export function envConfigLayer(env: NodeJS.ProcessEnv = process.env): ConfigLayer {
  const canvas: RawSection = {};
  const loop: RawSection = {};

  if (env.METRIC_CANVAS_STYLE) canvas.style = env.METRIC_CANVAS_STYLE;
  if (env.METRIC_CANVAS_WIDTH) canvas.width = env.METRIC_CANVAS_WIDTH;
  if (env.METRIC_CANVAS_HEIGHT) canvas.height = env.METRIC_CANVAS_HEIGHT;
  if (env.METRIC_CANVAS_SEED) canvas.seed = env.METRIC_CANVAS_SEED;
  if (env.METRIC_CANVAS_INTERVAL) loop.interval = env.METRIC_CANVAS_INTERVAL;

  return { canvas, loop };
}

/** Later layers win, key by key. */
export function mergeLayers(...layers: ConfigLayer[]): ConfigLayer {
  return layers.reduce<ConfigLayer>(
    (merged, layer) => ({
      canvas: { ...merged.canvas, ...layer.canvas },
      loop: { ...merged.loop, ...layer.loop },
    }),
    {}
  );
}

function toInteger(value: unknown, name: string, min: number, max: number): number {
  const parsed =
    typeof value === "number"
      ? value
      : typeof value === "string" && /^\d+$/.test(value.trim())
        ? Number(value.trim())
        : Number.NaN;

  if (!Number.isSafeInteger(parsed) || parsed < min || parsed > max) {
    throw new ConfigError(`${name} must be an integer between ${min} and ${max}, got ${JSON.stringify(value)}`);
  }
  return parsed;
}

export function validateConfig(layer: ConfigLayer): Config {
  const canvas: RawSection = { ...defaultConfig.canvas, ...layer.canvas };
  const loop: RawSection = { ...defaultConfig.loop, ...layer.loop };

  const style = canvas.style;
  if (!isStyleName(style)) {
    throw new ConfigError(
      `Unknown style ${JSON.stringify(style)} (expected one of: ${STYLE_NAMES.join(", ")})`
    );
  }

  const config: Config = {
    canvas: {
      width: toInteger(canvas.width, "width", 1, MAX_DIMENSION),
      height: toInteger(canvas.height, "height", 1, MAX_DIMENSION),
      style,
    },
    loop: {
      interval: toInteger(loop.interval, "interval", 0, Number.MAX_SAFE_INTEGER),
    },
  };

  if (canvas.seed !== undefined && canvas.seed !== null) {
    config.canvas.seed = toInteger(canvas.seed, "seed", 0, Number.MAX_SAFE_INTEGER);
  }

  return config;
}

export function loadConfig(configPath?: string, flags: ConfigLayer = {}): Config {
  return validateConfig(mergeLayers(loadConfigFile(configPath), envConfigLayer(), flags));
}
