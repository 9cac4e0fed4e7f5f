export { BirdGateway } from "./bird-gateway";
export type { BirdGatewayConfig } from "./bird-gateway";
export { BirdSession, withBirdSession } from "./session";
export {
	ReplyCode,
	ReplyReader,
	isErrorCode,
	parseReplyLine,
	replyText,
} from "./reply";
export type { BirdReply, ParsedLine, ReplyLine } from "./reply";
export { parseRouteCommunities } from "./routes";
export {
	DEFAULT_PLACEHOLDER,
	renderCommunityBlock,
	renderConfig,
	writeConfigFromTemplate,
} from "./config-template";
export type { TemplatePaths } from "./config-template";
