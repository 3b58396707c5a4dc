/**
 * Server configuration from the environment
 */

import { parseLogLevel, type LogLevel } from "./observability/logger.js";
import { READ_ONLY_TOOLS, toolDefinitions } from "./tools.js";

export interface ServerConfig {
  enabled: boolean;
  readOnly: boolean;
  dataRoot: string;
  logLevel: LogLevel;
}

/**
 * MCP_SUBDOC_ENABLED defaults to enabled; MCP_SUBDOC_READONLY to read-write
 */
export function resolveServerConfig(env: NodeJS.ProcessEnv): ServerConfig {
  return {
    enabled: env.MCP_SUBDOC_ENABLED !== "false",
    readOnly: env.MCP_SUBDOC_READONLY === "true",
    dataRoot: env.DATA_ROOT || "./data",
    logLevel: parseLogLevel(env.LOG_LEVEL),
  };
}

/**
 * Tools offered to clients; read-only mode keeps only the lookups
 */
export function selectTools(readOnly: boolean): typeof toolDefinitions {
  return readOnly
    ? toolDefinitions.filter((tool) => READ_ONLY_TOOLS.includes(tool.name))
    : toolDefinitions;
}
