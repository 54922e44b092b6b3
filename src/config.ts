import convict from "convict";
import { existsSync } from "fs";
import { homedir } from "os";
import path from "path";
import { format } from "util";
import { DEFAULT_DISCOVERY_COMMAND, KEYLIGHT_SERVICE_TYPE } from "./discovery.js";
import { DEFAULT_TIMEOUT } from "./api.js";
import { LOG_LEVEL_NAMES, type LogLevelName } from "./log.js";

export interface KeylightConfig {
  discovery: {
    command: string;
    service: string;
    enabled: boolean;
  };
  api: {
    timeout: number;
  };
  ui: {
    interval: number;
  };
  logging: {
    level: LogLevelName;
    file: string | null;
  };
}

export type Config = convict.Config<KeylightConfig>;

convict.addFormat({
  name: "nullable-string",
  validate: (val: unknown): void => {
    if (val === null) {
      return;
    }
    if (typeof val !== "string") {
      throw new Error("must be null or a string");
    }
  },
  coerce: (val: unknown): unknown => {
    if (val === null || typeof val === "string") {
      return val;
    }
    return format(val);
  },
});

function createSchema(): convict.Schema<KeylightConfig> {
  return {
    discovery: {
      command: {
        doc: "Discovery command printing avahi-browse parsable output",
        format: String,
        default: DEFAULT_DISCOVERY_COMMAND,
        env: "KEYLIGHT_DISCOVERY_COMMAND",
      },
      service: {
        doc: "mDNS service type the lights announce",
        format: String,
        default: KEYLIGHT_SERVICE_TYPE,
        env: "KEYLIGHT_SERVICE",
      },
      enabled: {
        doc: "Keep the device list current with continuous discovery",
        format: Boolean,
        default: true,
        env: "KEYLIGHT_DISCOVERY",
      },
    },
    api: {
      timeout: {
        doc: "HTTP request timeout in milliseconds",
        format: "nat",
        default: DEFAULT_TIMEOUT,
        env: "KEYLIGHT_TIMEOUT",
      },
    },
    ui: {
      interval: {
        doc: "Dashboard polling interval in seconds",
        format: "nat",
        default: 10,
        env: "KEYLIGHT_INTERVAL",
      },
    },
    logging: {
      level: {
        doc: "Console log level",
        format: [...LOG_LEVEL_NAMES],
        default: "log",
        env: "KEYLIGHT_LOG_LEVEL",
      },
      file: {
        doc: "Append log lines to this file",
        format: "nullable-string",
        default: null,
        env: "KEYLIGHT_LOG_FILE",
      },
    },
  };
}

export function defaultConfigPath(): string {
  return path.join(homedir(), ".config", "keylight-tui", "config.json");
}

export interface LoadConfigOptions {
  /** Config file to load; it must exist. */
  file?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Builds the configuration from defaults, the environment and a JSON file:
 * `file` when given, otherwise the default path when it exists.
 */
export function loadConfig(options: LoadConfigOptions = {}): Config {
  const config = convict<KeylightConfig>(createSchema(), {
    env: options.env ?? process.env,
    args: [],
  });

  const file = options.file ?? defaultConfigPath();
  if (options.file !== undefined || existsSync(file)) {
    config.loadFile(file);
  }

  config.validate({ allowed: "strict" });
  return config;
}
