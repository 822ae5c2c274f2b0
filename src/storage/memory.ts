import type { StorageBackend } from "./interface.js";

/**
 * In-memory storage backend for tests and embedded corpora.
 * Data is lost when the process exits.
 */
export class MemoryStorage implements StorageBackend {
	private data = new Map<string, string>();

	constructor(initial?: Record<string, string>) {
		if (initial) {
			for (const [key, value] of Object.entries(initial)) {
				this.data.set(key, value);
			}
		}
	}

	async get(key: string): Promise<string | null> {
		return this.data.get(key) ?? null;
	}

	async put(key: string, value: string): Promise<void> {
		this.data.set(key, value);
	}

	async list(prefix: string): Promise<string[]> {
		const keys: string[] = [];
		for (const key of this.data.keys()) {
			if (key.startsWith(prefix)) {
				keys.push(key);
			}
		}
		return keys.sort();
	}

	/**
	 * Clear all data. Useful for test cleanup.
	 */
	clear(): void {
		this.data.clear();
	}
}
