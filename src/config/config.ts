/**
 * Channel configuration with validation
 */
import { isUint16 } from "../protocol/community";
import { isCidrPrefix } from "../net/prefix";
import { DEFAULT_PLACEHOLDER } from "../net/bird/config-template";

export interface ChannelConfig {
  /** AS number both peers tag their game-state communities with */
  markerAS: number;
  /** Prefix the opponent announces */
  prefix: string;
  /** Daemon configuration template */
  templatePath: string;
  /** Daemon configuration file written on every publish */
  configPath: string;
  /** Daemon control socket */
  socketPath: string;
  /** Placeholder in the template replaced by the community statements */
  placeholder: string;
  /** Enable debug logging */
  debug: boolean;
}

export const DEFAULT_CONFIG: Readonly<ChannelConfig> = {
  markerAS: 23456,
  prefix: "1.1.1.0/24",
  templatePath: "/etc/bird/conf.orig",
  configPath: "/etc/bird/bird.conf",
  socketPath: "/run/bird/bird.ctl",
  placeholder: DEFAULT_PLACEHOLDER,
  debug: false,
};

type Env = Record<string, string | undefined>;

function optionalEnv(env: Env, name: string, defaultValue: string): string {
  return env[name] || defaultValue;
}

function parseMarkerAS(raw: string): number {
  const value = /^\d+$/.test(raw) ? parseInt(raw, 10) : NaN;
  if (!isUint16(value)) {
    throw new Error(`COMMUNITY_ASN must be an integer between 0 and 65535, got "${raw}"`);
  }
  return value;
}

function parsePrefix(raw: string): string {
  if (!isCidrPrefix(raw)) {
    throw new Error(`PEER_PREFIX must be a CIDR prefix, got "${raw}"`);
  }
  return raw;
}

function parseFlag(name: string, raw: string): boolean {
  switch (raw.toLowerCase()) {
    case "1":
    case "true":
    case "yes":
      return true;
    case "0":
    case "false":
    case "no":
      return false;
    default:
      throw new Error(`${name} must be a boolean, got "${raw}"`);
  }
}

/**
 * Builds the configuration from environment variables, falling back to
 * {@link DEFAULT_CONFIG} for anything unset or empty.
 *
 * | variable             | field        |
 * |----------------------|--------------|
 * | COMMUNITY_ASN        | markerAS     |
 * | PEER_PREFIX          | prefix       |
 * | BIRD_TEMPLATE_FILE   | templatePath |
 * | BIRD_CONF_FILE       | configPath   |
 * | BIRD_SOCKET          | socketPath   |
 * | BIRD_PLACEHOLDER     | placeholder  |
 * | DEBUG                | debug        |
 *
 * @throws Error when a value is present but invalid
 */
export function loadConfig(env: Env = process.env): ChannelConfig {
  return {
    markerAS: parseMarkerAS(optionalEnv(env, "COMMUNITY_ASN", `${DEFAULT_CONFIG.markerAS}`)),
    prefix: parsePrefix(optionalEnv(env, "PEER_PREFIX", DEFAULT_CONFIG.prefix)),
    templatePath: optionalEnv(env, "BIRD_TEMPLATE_FILE", DEFAULT_CONFIG.templatePath),
    configPath: optionalEnv(env, "BIRD_CONF_FILE", DEFAULT_CONFIG.configPath),
    socketPath: optionalEnv(env, "BIRD_SOCKET", DEFAULT_CONFIG.socketPath),
    placeholder: optionalEnv(env, "BIRD_PLACEHOLDER", DEFAULT_CONFIG.placeholder),
    debug: parseFlag("DEBUG", optionalEnv(env, "DEBUG", `${DEFAULT_CONFIG.debug}`)),
  };
}
