export { loadConfig, DEFAULT_CONFIG } from "./config";
export type { ChannelConfig } from "./config";
