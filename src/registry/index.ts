export type {
	Registry,
	RegistryOptions,
	RegistrySnapshot,
} from "./registry.js";
export { createRegistry } from "./registry.js";
