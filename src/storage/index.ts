export { FileSystemStorage } from "./filesystem.js";
export type { StorageBackend } from "./interface.js";
export { MemoryStorage } from "./memory.js";
