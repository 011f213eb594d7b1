import { z } from 'zod';
import { DEFAULT_ANALYZER_NAME } from '../../domain/analysis/analyzer';
import type { RawAnnotationSettings } from '../../domain/config/annotation-settings';
import { LogLevel } from '../logging/logger';

/**
 * Application configuration interface
 */
export interface AppConfig {
	analyzer: AnalyzerConfig;
	logging: LoggingConfig;
}

/**
 * Analyzer configuration. Settings stay raw until the analyzer is built,
 * where they are validated.
 */
export interface AnalyzerConfig {
	name: string;
	settings: RawAnnotationSettings;
}

export interface LoggingConfig {
	level: LogLevel;
}

export const DEFAULT_APP_CONFIG: AppConfig = {
	analyzer: {
		name: DEFAULT_ANALYZER_NAME,
		settings: {},
	},
	logging: {
		level: LogLevel.INFO,
	},
};

/**
 * Environment variables mapped onto annotation setting keys
 */
const SETTING_VARIABLES = {
	ANNOTATION_START: 'start',
	ANNOTATION_END: 'end',
	ANNOTATION_PREFIX: 'prefix',
	ANNOTATION_SUFFIX: 'suffix',
	ANNOTATION_DELIMITER: 'delimiter',
	ANNOTATION_TOKEN_TYPE: 'token-type',
} as const;

const logLevelSchema = z.nativeEnum(LogLevel).catch(LogLevel.INFO);

/**
 * Configuration manager for centralized configuration access
 */
export class ConfigManager {
	private readonly config: AppConfig;

	constructor(customConfig?: Partial<AppConfig>) {
		this.config = this.mergeConfig(DEFAULT_APP_CONFIG, customConfig);
	}

	getConfig(): AppConfig {
		return { ...this.config };
	}

	getAnalyzerConfig(): AnalyzerConfig {
		return { ...this.config.analyzer };
	}

	getLoggingConfig(): LoggingConfig {
		return { ...this.config.logging };
	}

	/**
	 * Create configuration from environment variables
	 */
	static fromEnvironment(env: Record<string, string | undefined> = {}): ConfigManager {
		const settings: Record<string, string> = {};
		for (const [variable, option] of Object.entries(SETTING_VARIABLES)) {
			const value = env[variable];
			if (value !== undefined) {
				settings[option] = value;
			}
		}

		return new ConfigManager({
			analyzer: {
				name: env.ANNOTATION_ANALYZER_NAME || DEFAULT_ANALYZER_NAME,
				settings,
			},
			logging: {
				level: env.LOG_LEVEL ? logLevelSchema.parse(env.LOG_LEVEL.toLowerCase()) : LogLevel.INFO,
			},
		});
	}

	private mergeConfig(base: AppConfig, override?: Partial<AppConfig>): AppConfig {
		if (!override) return base;

		return {
			analyzer: {
				...base.analyzer,
				...override.analyzer,
				settings: { ...base.analyzer.settings, ...override.analyzer?.settings },
			},
			logging: { ...base.logging, ...override.logging },
		};
	}
}
