export { CommunityChannel } from "./community-channel";
export type { CommunityChannelConfig } from "./community-channel";
