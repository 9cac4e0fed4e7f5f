import { readFile, writeFile } from "node:fs/promises";

export const DEFAULT_PLACEHOLDER = "###COMMUNITY###";

export interface TemplatePaths {
	/** Daemon configuration with a placeholder where the filter statements go */
	templatePath: string;
	/** Where the rendered configuration is written */
	configPath: string;
	placeholder: string;
}

/**
 * Filter statements that add the two game-state communities to the export.
 */
export function renderCommunityBlock(
	markerAS: number,
	counterCommunity: number,
	positionCommunity: number
): string {
	return (
		`\nbgp_community.add((${markerAS},${positionCommunity}));` +
		`\nbgp_community.add((${markerAS},${counterCommunity}));\n`
	);
}

/**
 * Replaces the first occurrence of `placeholder` in `template` with `block`.
 * @throws Error when the template has no placeholder
 */
export function renderConfig(template: string, block: string, placeholder: string): string {
	const at = template.indexOf(placeholder);
	if (at === -1) {
		throw new Error(`Template does not contain placeholder ${placeholder}`);
	}
	return template.slice(0, at) + block + template.slice(at + placeholder.length);
}

/**
 * Renders the template with `block` and writes it to the config path (mode 0640).
 */
export async function writeConfigFromTemplate(paths: TemplatePaths, block: string): Promise<void> {
	const template = await readFile(paths.templatePath, "utf8");
	const output = renderConfig(template, block, paths.placeholder);
	await writeFile(paths.configPath, output, { mode: 0o640 });
}
