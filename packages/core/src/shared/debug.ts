/**
 * Debug Channels
 *
 * Targeted debug logging for registration, type resolution and source
 * transformation. Channels are no-ops unless enabled.
 *
 * ## Usage
 *
 * Enable via environment variable:
 * ```bash
 * WIREMAP_DEBUG=register npm test         # Just class registration
 * WIREMAP_DEBUG=register,types npm test   # Multiple channels
 * WIREMAP_DEBUG=* npm test                # Everything
 * ```
 *
 * In code:
 * ```typescript
 * debug.register("input", { className, wireNames });
 * ```
 */

/** Debug data can be any serializable value */
export type DebugData = Record<string, unknown>;

/** A debug channel function - logs when enabled, no-op when disabled */
export type DebugChannel = (point: string, data?: DebugData) => void;

/** Configuration for debug output */
export interface DebugConfig {
  /** Format output as JSON (machine-readable) or pretty (human-readable) */
  format: "json" | "pretty";
  /** Include timestamps in output */
  timestamps: boolean;
  /** Custom output function (defaults to console.log) */
  output: (message: string) => void;
}

const DEFAULT_CONFIG: DebugConfig = {
  format: "pretty",
  timestamps: false,
  output: console.log,
};

let config: DebugConfig = { ...DEFAULT_CONFIG };

function parseDebugEnv(): Set<string> {
  const env = process.env["WIREMAP_DEBUG"] ?? "";
  if (!env || env === "0" || env === "false") return new Set();
  if (env === "*" || env === "1" || env === "true") {
    return new Set(["*"]);
  }
  return new Set(env.split(",").map((s) => s.trim().toLowerCase()));
}

let enabledChannels = parseDebugEnv();

const extraChannels = new Map<string, DebugChannel>();

function isEnabled(channel: string): boolean {
  return enabledChannels.has("*") || enabledChannels.has(channel.toLowerCase());
}

function formatMessage(channel: string, point: string, data: DebugData | undefined): string {
  const prefix = config.timestamps ? `[${new Date().toISOString()}] ` : "";

  if (config.format === "json") {
    return JSON.stringify({
      channel,
      point,
      ...(data && { data }),
      ...(config.timestamps && { timestamp: Date.now() }),
    });
  }

  const label = `[${channel}.${point}]`;
  if (!data || Object.keys(data).length === 0) {
    return `${prefix}${label}`;
  }
  return `${prefix}${label} ${formatData(data)}`;
}

function formatData(data: DebugData): string {
  const parts = Object.entries(data).map(([key, value]) => `${key}=${formatValue(value)}`);
  return `{ ${parts.join(", ")} }`;
}

function formatValue(value: unknown): string {
  if (value === null) return "null";
  if (value === undefined) return "undefined";
  if (typeof value === "string") {
    if (value.length > 60) return `"${value.slice(0, 57)}..."`;
    return `"${value}"`;
  }
  if (typeof value === "number" || typeof value === "boolean" || typeof value === "bigint") {
    return String(value);
  }
  if (typeof value === "function") {
    return `<${value.name || "anonymous"}>`;
  }
  if (Array.isArray(value)) {
    if (value.length === 0) return "[]";
    if (value.length <= 4) return `[${value.map(formatValue).join(", ")}]`;
    return `[${value.length} items]`;
  }
  if (typeof value === "object" && "kind" in value && typeof value.kind === "string") {
    return `<${value.kind}>`;
  }
  try {
    return JSON.stringify(value);
  } catch {
    return "[unserializable]";
  }
}

function createChannel(name: string): DebugChannel {
  if (!isEnabled(name)) {
    return () => {};
  }
  return (point: string, data?: DebugData) => {
    config.output(formatMessage(name, point, data));
  };
}

/**
 * Get or create an extra debug channel by name.
 * Channels are refreshed when refreshDebugChannels() is called.
 */
export function getDebugChannel(name: string): DebugChannel {
  const key = name.trim().toLowerCase();
  if (!key) return () => {};
  const existing = extraChannels.get(key);
  if (existing) return existing;
  const channel = createChannel(key);
  extraChannels.set(key, channel);
  return channel;
}

/**
 * Re-read WIREMAP_DEBUG and recreate every channel.
 */
export function refreshDebugChannels(): void {
  enabledChannels = parseDebugEnv();
  debug.register = createChannel("register");
  debug.types = createChannel("types");
  debug.transform = createChannel("transform");
  for (const name of extraChannels.keys()) {
    extraChannels.set(name, createChannel(name));
  }
}

export function configureDebug(options: Partial<DebugConfig>): void {
  config = { ...config, ...options };
}

/**
 * Check if any debug channel is enabled.
 * Useful for conditional expensive computations.
 */
export function isDebugEnabled(channel?: string): boolean {
  if (channel) return isEnabled(channel);
  return enabledChannels.size > 0;
}

export const debug = {
  /** Class registration (scanning, accessor and equality synthesis) */
  register: createChannel("register"),

  /** Type resolution and introspection queries */
  types: createChannel("types"),

  /** Source transformation (code generation) */
  transform: createChannel("transform"),
};

export type Debug = typeof debug;
