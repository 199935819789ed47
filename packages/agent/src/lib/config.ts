/**
 * Local configuration for the edge agent.
 *
 * Everything the agent needs to survive a restart lives in
 * ~/.edge-agent/config.yaml: the server URL, the identity the server
 * assigned on first registration, and the capture defaults the server may
 * later change with `edge.update_config`.
 *
 * Directory layout:
 *   ~/.edge-agent/
 *     config.yaml: identity, server URL, capture settings
 *     recordings/: finished WAV files and their hand-off sidecars
 *
 * Reads and writes are synchronous: the file is loaded once at startup and
 * only rewritten on init, on first registration, and on config pushes.
 */

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import * as crypto from "node:crypto";
import { parse as parseYaml, stringify as stringifyYaml } from "yaml";
import { z } from "zod";
import { bitDepthSchema, ConfigError } from "@edge-fleet/shared";

// ---------------------------------------------------------------------------
// Path constants
// ---------------------------------------------------------------------------

export const CONFIG_DIR = path.join(os.homedir(), ".edge-agent");
export const CONFIG_PATH = path.join(CONFIG_DIR, "config.yaml");
export const RECORDINGS_DIR = path.join(CONFIG_DIR, "recordings");

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

const agentConfigSchema = z.object({
  server: z.object({
    /** HTTP(S) base URL of the fleet server; the socket path is derived from it */
    url: z.string().url(),
  }),
  device: z.object({
    /** Assigned by the server on first registration, null until then */
    id: z.string().min(1).nullable().default(null),
    name: z.string().min(1).max(200),
  }),
  audio: z.object({
    default_device_index: z.number().int().nonnegative().default(0),
    channels: z.number().int().min(1).max(32).default(1),
    sample_rate: z.number().int().min(8000).max(384000).default(16000),
    bit_depth: bitDepthSchema.default(16),
  }).default({}),
  heartbeat_interval_seconds: z.number().positive().default(30),
  reconnect: z.object({
    initial_delay_ms: z.number().int().positive().default(5_000),
    max_delay_ms: z.number().int().positive().default(60_000),
  }).default({}),
  recordings_dir: z.string().min(1),
  capture: z.object({
    backend: z.enum(["arecord", "silence"]).default("arecord"),
  }).default({}),
  /** Minimum advance before another progress frame goes out */
  progress_step_percent: z.number().int().min(1).max(100).default(10),
  /** Recording events held while disconnected; the oldest is dropped beyond this */
  outbox_limit: z.number().int().positive().default(100),
  log_file: z.string().min(1).nullable().default(null),
  /** Oldest recordings are evicted once recordings_dir grows past threshold_percent of max_size_gb */
  storage_cleanup: z
    .object({
      enabled: z.boolean().default(true),
      check_interval_minutes: z.number().positive().default(60),
      max_size_gb: z.number().positive().default(20),
      threshold_percent: z.number().min(1).max(100).default(90),
      target_percent: z.number().min(1).max(100).default(70),
    })
    .refine((c) => c.target_percent < c.threshold_percent, {
      message: "must be below threshold_percent",
      path: ["target_percent"],
    })
    .default({}),
});

export type AgentConfig = z.infer<typeof agentConfigSchema>;
export type AgentConfigInput = z.input<typeof agentConfigSchema>;
export type CaptureBackendName = AgentConfig["capture"]["backend"];

// ---------------------------------------------------------------------------
// Path overrides for tests
// ---------------------------------------------------------------------------

let _configDirOverride: string | undefined;

export function getConfigDir(): string {
  return _configDirOverride ?? CONFIG_DIR;
}

export function getConfigPath(): string {
  return path.join(getConfigDir(), "config.yaml");
}

export function getRecordingsDir(): string {
  return _configDirOverride ? path.join(_configDirOverride, "recordings") : RECORDINGS_DIR;
}

/** Redirect every path to `baseDir`; `undefined` restores the real ones */
export function overrideConfigPaths(baseDir: string | undefined): void {
  _configDirOverride = baseDir;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export function configExists(): boolean {
  return fs.existsSync(getConfigPath());
}

/** Apply defaults to a partial config, failing with CONFIG_INVALID */
export function buildConfig(input: AgentConfigInput, source = "<memory>"): AgentConfig {
  const result = agentConfigSchema.safeParse(input);
  if (!result.success) {
    const problems = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new ConfigError(
      `Config at ${source} has invalid structure: ${problems.join("; ")}`,
      "CONFIG_INVALID",
      { path: source, problems },
    );
  }
  return result.data;
}

/**
 * Load and validate the config file.
 *
 * @throws ConfigError CONFIG_NOT_FOUND, CONFIG_CORRUPTED or CONFIG_INVALID
 */
export function loadConfig(): AgentConfig {
  const configPath = getConfigPath();

  if (!fs.existsSync(configPath)) {
    throw new ConfigError(
      `Config file not found at ${configPath}. Run 'edge-agent init' first.`,
      "CONFIG_NOT_FOUND",
      { path: configPath },
    );
  }

  const raw = fs.readFileSync(configPath, "utf-8");
  let parsed: unknown;
  try {
    parsed = parseYaml(raw);
  } catch (err) {
    throw new ConfigError(
      `Config file at ${configPath} is not valid YAML.`,
      "CONFIG_CORRUPTED",
      { path: configPath, parseError: String(err) },
    );
  }

  const result = agentConfigSchema.safeParse(parsed);
  if (!result.success) {
    const problems = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new ConfigError(
      `Config file at ${configPath} has invalid structure: ${problems.join("; ")}`,
      "CONFIG_INVALID",
      { path: configPath, problems },
    );
  }
  return result.data;
}

/**
 * Write the config atomically (temp file + rename in the same directory)
 * with owner-only permissions.
 */
export function saveConfig(config: AgentConfig): void {
  const configPath = getConfigPath();
  const configDir = getConfigDir();
  fs.mkdirSync(configDir, { recursive: true });

  const yamlContent =
    "# edge-agent configuration\n" +
    "# Written by 'edge-agent init' and updated by the fleet server.\n\n" +
    stringifyYaml(config, { lineWidth: 120 });

  const tmpPath = path.join(configDir, `.config.yaml.tmp.${crypto.randomBytes(4).toString("hex")}`);
  try {
    fs.writeFileSync(tmpPath, yamlContent, { mode: 0o600 });
    fs.renameSync(tmpPath, configPath);
  } catch (err) {
    fs.rmSync(tmpPath, { force: true });
    throw err;
  }
}

export function ensureDirectories(config: Pick<AgentConfig, "recordings_dir">): void {
  fs.mkdirSync(getConfigDir(), { recursive: true });
  fs.mkdirSync(config.recordings_dir, { recursive: true });
}
