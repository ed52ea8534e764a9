/**
 * Configuration module for the resource hook engine
 * Handles environment variables and engine settings
 */

export interface JsonApiHooksConfig {
    // Hook engine settings
    loadDatabaseValues: boolean;

    // Application settings
    nodeEnv: string;

    // Debug settings
    debugMode: boolean;
    logLevel: string;
    logPretty: boolean;
}

/**
 * Default configuration values
 */
const DEFAULT_CONFIG: JsonApiHooksConfig = {
    loadDatabaseValues: false,
    nodeEnv: "development",
    debugMode: false,
    logLevel: "info",
    logPretty: false
};

/**
 * Configuration singleton class
 */
class ConfigManager {
    private static instance: ConfigManager;
    private config: JsonApiHooksConfig;

    private constructor() {
        this.config = this.loadConfig();
    }

    public static getInstance(): ConfigManager {
        if (!ConfigManager.instance) {
            ConfigManager.instance = new ConfigManager();
        }
        return ConfigManager.instance;
    }

    /**
     * Load configuration from environment variables
     */
    private loadConfig(): JsonApiHooksConfig {
        return {
            loadDatabaseValues: this.parseBoolean(process.env.JSONAPI_LOAD_DATABASE_VALUES, DEFAULT_CONFIG.loadDatabaseValues),
            nodeEnv: process.env.NODE_ENV || DEFAULT_CONFIG.nodeEnv,
            debugMode: this.parseBoolean(process.env.DEBUG, DEFAULT_CONFIG.debugMode),
            logLevel: process.env.LOG_LEVEL || DEFAULT_CONFIG.logLevel,
            logPretty: this.parseBoolean(process.env.LOG_PRETTY, DEFAULT_CONFIG.logPretty)
        };
    }

    private parseBoolean(value: string | undefined, defaultValue: boolean): boolean {
        if (!value) return defaultValue;
        return value.toLowerCase() === "true" || value === "1";
    }

    /**
     * Get a specific configuration value
     */
    public get<K extends keyof JsonApiHooksConfig>(key: K): JsonApiHooksConfig[K] {
        return this.config[key];
    }

    /**
     * Whether Before hooks receive persisted values unless a hook opts out
     */
    public shouldLoadDatabaseValues(): boolean {
        return this.config.loadDatabaseValues;
    }

    public isDevelopment(): boolean {
        return this.config.nodeEnv === "development";
    }

    /**
     * Unexpected errors carry their message and stack in debug mode
     */
    public isDebugMode(): boolean {
        return this.config.debugMode;
    }

    /**
     * Reload configuration from environment variables
     */
    public reloadConfig(): void {
        this.config = this.loadConfig();
    }
}

/**
 * Global configuration instance
 */
export const config = ConfigManager.getInstance();

export default config;
