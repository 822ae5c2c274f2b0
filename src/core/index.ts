export {
	DomainError,
	EmptyQueryError,
	ErrorCode,
	Errors,
	ValidationError,
} from "./errors.js";
export type {
	FrontmatterError,
	FrontmatterErrorCode,
	ParsedFrontmatter,
} from "./frontmatter.js";
export { parseFrontmatter } from "./frontmatter.js";
export type { SkillLoadFailure, SkillLoadResult } from "./loader.js";
export {
	loadSkillDocuments,
	SKILL_FILE,
	toSkillDocumentInput,
} from "./loader.js";
