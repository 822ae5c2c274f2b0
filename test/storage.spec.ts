import { describe, expect, it } from "vitest";
import { MemoryStorage } from "../src/storage/memory.js";

describe("MemoryStorage", () => {
	it("returns null for a missing key", async () => {
		expect(await new MemoryStorage().get("missing")).toBeNull();
	});

	it("stores and reads values", async () => {
		// Arrange
		const storage = new MemoryStorage();

		// Act
		await storage.put("husky/SKILL.md", "content");

		// Assert
		expect(await storage.get("husky/SKILL.md")).toBe("content");
	});

	it("lists keys under a prefix in order", async () => {
		// Arrange
		const storage = new MemoryStorage({
			"zod/SKILL.md": "z",
			"husky/SKILL.md": "h",
			"husky/notes.md": "n",
		});

		// Act & Assert
		expect(await storage.list("")).toEqual([
			"husky/SKILL.md",
			"husky/notes.md",
			"zod/SKILL.md",
		]);
		expect(await storage.list("husky/")).toEqual(["husky/SKILL.md", "husky/notes.md"]);
	});

	it("forgets everything on clear", async () => {
		// Arrange
		const storage = new MemoryStorage({ "a/SKILL.md": "a" });

		// Act
		storage.clear();

		// Assert
		expect(await storage.list("")).toEqual([]);
	});
});
