import { Result } from "better-result";
import type { SkillFrontmatter } from "../types/index.js";
import { skillFrontmatterSchema } from "../types/index.js";

/**
 * Result of parsing frontmatter from markdown content.
 */
export interface ParsedFrontmatter {
	frontmatter: SkillFrontmatter;
	body: string;
}

/**
 * Error codes for frontmatter parsing.
 */
export type FrontmatterErrorCode =
	| "MISSING_FRONTMATTER"
	| "INVALID_YAML"
	| "INVALID_FRONTMATTER";

/**
 * Error returned when frontmatter parsing fails.
 */
export interface FrontmatterError {
	code: FrontmatterErrorCode;
	message: string;
	details?: string;
}

type YamlScalar = string | string[];
type YamlValue = YamlScalar | Record<string, YamlScalar>;

interface PendingBlock {
	key: string | null;
	object: Record<string, YamlScalar> | null;
	list: string[] | null;
	/** Nested key whose value is a block list ("  tags:" then "    - a") */
	nestedListKey: string | null;
}

/**
 * Parse YAML frontmatter from a SKILL.md file.
 *
 * Expects content in the format:
 * ```
 * ---
 * name: husky
 * description: Git hooks made easy
 * metadata:
 *   category: devops
 *   tags: [git, hooks]
 *   triggers: [husky, pre-commit]
 * ---
 * # Body content
 * ```
 */
export function parseFrontmatter(
	content: string,
): Result<ParsedFrontmatter, FrontmatterError> {
	const normalized = content.replace(/\r\n/g, "\n");

	if (!normalized.startsWith("---")) {
		return Result.err({
			code: "MISSING_FRONTMATTER",
			message: "Content must start with YAML frontmatter (---)",
		});
	}

	const endIndex = normalized.indexOf("\n---", 3);
	if (endIndex === -1) {
		return Result.err({
			code: "MISSING_FRONTMATTER",
			message: "Frontmatter must have a closing delimiter (---)",
		});
	}

	const yamlContent = normalized.slice(4, endIndex).trim();
	const body = normalized.slice(endIndex + 4).trim();

	const parseResult = parseSimpleYaml(yamlContent);
	if (parseResult.isErr()) {
		return Result.err(parseResult.error);
	}

	const validated = skillFrontmatterSchema.safeParse(parseResult.value);
	if (!validated.success) {
		return Result.err({
			code: "INVALID_FRONTMATTER",
			message: "Invalid frontmatter",
			details: validated.error.issues
				.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
				.join("; "),
		});
	}

	return Result.ok({
		frontmatter: validated.data,
		body,
	});
}

function flush(pending: PendingBlock, into: Record<string, YamlValue>): void {
	if (pending.key !== null) {
		if (pending.object !== null) {
			into[pending.key] = pending.object;
		} else if (pending.list !== null) {
			into[pending.key] = pending.list;
		}
	}
	pending.key = null;
	pending.object = null;
	pending.list = null;
	pending.nestedListKey = null;
}

/**
 * Simple YAML parser for frontmatter.
 * Handles key-value pairs, flow lists ([a, b]), block lists (- a) and one
 * level of nested objects (metadata).
 */
function parseSimpleYaml(
	yaml: string,
): Result<Record<string, YamlValue>, FrontmatterError> {
	const result: Record<string, YamlValue> = {};
	const pending: PendingBlock = {
		key: null,
		object: null,
		list: null,
		nestedListKey: null,
	};

	for (const line of yaml.split("\n")) {
		const trimmed = line.trim();
		if (trimmed === "" || trimmed.startsWith("#")) continue;

		// Block list item, under a top-level key or a nested key
		const itemMatch = line.match(/^\s*-\s+(.*)$/);
		if (itemMatch && pending.key !== null) {
			const item = unquote(itemMatch[1]?.trim() ?? "");
			if (pending.object !== null && pending.nestedListKey !== null) {
				const existing = pending.object[pending.nestedListKey];
				pending.object[pending.nestedListKey] = Array.isArray(existing)
					? [...existing, item]
					: [item];
			} else if (pending.object === null) {
				pending.list = [...(pending.list ?? []), item];
			} else {
				return Result.err({
					code: "INVALID_YAML",
					message: `Unexpected list item: ${line}`,
				});
			}
			continue;
		}

		// Nested key (indented) under the pending top-level key
		if (/^\s/.test(line) && pending.key !== null) {
			const nestedMatch = line.match(/^\s+([a-zA-Z0-9_-]+):\s*(.*)$/);
			const nestedKey = nestedMatch?.[1];
			if (!nestedKey || pending.list !== null) {
				return Result.err({
					code: "INVALID_YAML",
					message: `Invalid YAML syntax: ${line}`,
				});
			}

			const nestedValue = nestedMatch?.[2]?.trim() ?? "";
			pending.object = pending.object ?? {};
			if (nestedValue === "") {
				pending.nestedListKey = nestedKey;
				pending.object[nestedKey] = [];
			} else {
				pending.nestedListKey = null;
				pending.object[nestedKey] = parseScalar(nestedValue);
			}
			continue;
		}

		flush(pending, result);

		const match = line.match(/^([a-zA-Z0-9_-]+):\s*(.*)$/);
		const key = match?.[1];
		if (!key) {
			return Result.err({
				code: "INVALID_YAML",
				message: `Invalid YAML syntax: ${line}`,
			});
		}

		const value = match?.[2]?.trim() ?? "";

		// Empty value opens a nested object or block list
		if (value === "") {
			pending.key = key;
		} else {
			result[key] = parseScalar(value);
		}
	}

	flush(pending, result);
	return Result.ok(result);
}

/**
 * A plain or quoted string, or a flow list ("[a, 'b c']").
 */
function parseScalar(value: string): YamlScalar {
	if (value.startsWith("[") && value.endsWith("]")) {
		return value
			.slice(1, -1)
			.split(",")
			.map((item) => unquote(item.trim()))
			.filter((item) => item !== "");
	}
	return unquote(value);
}

/**
 * Remove quotes from a YAML string value.
 */
function unquote(value: string): string {
	if (
		value.length >= 2 &&
		((value.startsWith('"') && value.endsWith('"')) ||
			(value.startsWith("'") && value.endsWith("'")))
	) {
		return value.slice(1, -1);
	}
	return value;
}
