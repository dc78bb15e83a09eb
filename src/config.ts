import { config as dotenvConfig } from "dotenv";

// Load environment variables
dotenvConfig();

export interface LoggingConfig {
	level: string;
}

export interface Config {
	logging: LoggingConfig;
	nodeEnv: string;
}

const LOG_LEVELS = ["error", "warn", "info", "http", "verbose", "debug", "silly"];

function getEnvVar(key: string, defaultValue: string): string {
	const value = process.env[key];
	return value === undefined || value === "" ? defaultValue : value;
}

function getLogLevel(key: string, defaultValue: string): string {
	const value = getEnvVar(key, defaultValue).toLowerCase();
	if (!LOG_LEVELS.includes(value)) {
		throw new Error(`Environment variable ${key} must be one of ${LOG_LEVELS.join(", ")}`);
	}
	return value;
}

export const config: Config = {
	logging: {
		level: getLogLevel("CSVW_LOG_LEVEL", "warn"),
	},
	nodeEnv: getEnvVar("NODE_ENV", "development"),
};
