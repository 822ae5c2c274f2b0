export {
	type AppEnv,
	type AppVariables,
	type CreateAppOptions,
	createApp,
} from "./app.js";
