/**
 * Storage backend the skill loader reads from.
 *
 * Keys are slash-separated paths relative to the storage root:
 * - {skill-dir}/SKILL.md
 */
export interface StorageBackend {
	/**
	 * Get a value by key.
	 * @returns The value as a string, or null if not found.
	 */
	get(key: string): Promise<string | null>;

	/**
	 * Store a value at a key.
	 * Overwrites any existing value.
	 */
	put(key: string, value: string): Promise<void>;

	/**
	 * List all keys matching a prefix.
	 * @returns Array of matching keys (not values).
	 */
	list(prefix: string): Promise<string[]>;
}
