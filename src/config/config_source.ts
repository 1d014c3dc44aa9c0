import { config as loadEnv } from "dotenv";

import { MsgbaseError } from "../msgbase/msgbase_error";

if (process.env.NODE_ENV !== "production") {
  loadEnv();
}

/** `section.key` lookups, ini style. Missing options are `undefined`. */
export interface ConfigSource {
  get(section: string, key: string): string | undefined;
}

export type ConfigSections = Record<string, Record<string, string>>;

export class SectionConfig implements ConfigSource {
  constructor(private readonly sections: ConfigSections = {}) {}

  get(section: string, key: string): string | undefined {
    return this.sections[section]?.[key];
  }
}

const ENV_PREFIX = "MSGBASE_";

export const envVarName = (section: string, key: string) =>
  `${ENV_PREFIX}${section}_${key}`.toUpperCase().replace(/[^A-Z0-9]/g, "_");

/**
 * Reads `section.key` from the environment: `msg.network_tags` is
 * `MSGBASE_MSG_NETWORK_TAGS`, `msgnet_fidonet.queue_db_name` is
 * `MSGBASE_MSGNET_FIDONET_QUEUE_DB_NAME`.
 */
export class EnvConfig implements ConfigSource {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  get(section: string, key: string): string | undefined {
    const value = this.env[envVarName(section, key)];
    return value === undefined || value === "" ? undefined : value;
  }
}

export function requireOption(config: ConfigSource, section: string, key: string): string {
  const value = config.get(section, key);
  if (value === undefined) {
    throw new MsgbaseError({
      code: "configuration_missing",
      message: `Missing configuration option ${section}.${key}`,
      section,
      key,
    });
  }
  return value;
}

export const parseTagList = (value: string | undefined): string[] =>
  (value ?? "")
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
