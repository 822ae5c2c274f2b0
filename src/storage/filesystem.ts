import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { StorageBackend } from "./interface.js";

function errorCode(err: unknown): string | undefined {
	if (typeof err === "object" && err !== null && "code" in err) {
		const { code } = err;
		return typeof code === "string" ? code : undefined;
	}
	return undefined;
}

/**
 * File system storage backend for a skills directory on disk.
 * Each key is a file path relative to the base directory.
 */
export class FileSystemStorage implements StorageBackend {
	private basePath: string;

	constructor(basePath: string) {
		this.basePath = path.resolve(basePath);
	}

	private keyToPath(key: string): string {
		return path.join(this.basePath, ...key.split("/"));
	}

	private pathToKey(filePath: string): string {
		return path.relative(this.basePath, filePath).split(path.sep).join("/");
	}

	async get(key: string): Promise<string | null> {
		try {
			return await fs.readFile(this.keyToPath(key), "utf-8");
		} catch (err) {
			if (errorCode(err) === "ENOENT") {
				return null;
			}
			throw err;
		}
	}

	async put(key: string, value: string): Promise<void> {
		const filePath = this.keyToPath(key);
		await fs.mkdir(path.dirname(filePath), { recursive: true });
		await fs.writeFile(filePath, value, "utf-8");
	}

	async list(prefix: string): Promise<string[]> {
		const results: string[] = [];

		// Start from the deepest existing directory on the prefix path
		let searchDir = this.keyToPath(prefix);
		while (searchDir !== this.basePath) {
			const stat = await fs.stat(searchDir).catch((err: unknown) => {
				if (errorCode(err) === "ENOENT" || errorCode(err) === "ENOTDIR") {
					return null;
				}
				throw err;
			});
			if (stat?.isDirectory()) {
				break;
			}
			searchDir = path.dirname(searchDir);
		}

		try {
			await this.listRecursive(searchDir, prefix, results);
		} catch (err) {
			if (errorCode(err) === "ENOENT") {
				return [];
			}
			throw err;
		}

		return results.sort();
	}

	private async listRecursive(
		dir: string,
		prefix: string,
		results: string[],
	): Promise<void> {
		const entries = await fs.readdir(dir, { withFileTypes: true });

		for (const entry of entries) {
			const fullPath = path.join(dir, entry.name);
			const key = this.pathToKey(fullPath);

			if (entry.isDirectory()) {
				// Only recurse if this directory could contain matching keys
				if (key.startsWith(prefix) || prefix.startsWith(`${key}/`)) {
					await this.listRecursive(fullPath, prefix, results);
				}
			} else if (entry.isFile()) {
				if (key.startsWith(prefix)) {
					results.push(key);
				}
			}
		}
	}
}
