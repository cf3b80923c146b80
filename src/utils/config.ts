import { cosmiconfig } from 'cosmiconfig';
import { DEFAULT_CONFIG, type ExtractorConfig } from '../types/index.js';
import { getLogger } from './logger.js';

/**
 * Config overrides as they come from the CLI, env vars or the config file.
 * Nested sections may be given partially.
 */
export type ConfigOverrides = Partial<Omit<ExtractorConfig, 'crossref' | 'llm' | 'download' | 'retry'>> & {
    crossref?: Partial<ExtractorConfig['crossref']>;
    llm?: Partial<ExtractorConfig['llm']>;
    download?: Partial<ExtractorConfig['download']>;
    retry?: Partial<ExtractorConfig['retry']>;
};

/**
 * Load configuration from propextract.config.json using cosmiconfig.
 * Returns null if no config file is found.
 */
async function loadConfigFile(searchFrom?: string): Promise<ConfigOverrides | null> {
    const explorer = cosmiconfig('propextract', {
        searchPlaces: ['propextract.config.json'],
    });

    try {
        const result = await explorer.search(searchFrom);
        if (result && !result.isEmpty && isRecord(result.config)) {
            getLogger().debug({ path: result.filepath }, 'Loaded config file');
            return result.config;
        }
    } catch (error) {
        getLogger().warn({ error }, 'Failed to load config file, using defaults');
    }

    return null;
}

/**
 * Read relevant environment variables.
 * API keys are read where needed (see getApiKey) and never stored in the config.
 */
export function loadEnvVars(env: NodeJS.ProcessEnv = process.env): ConfigOverrides {
    const overrides: ConfigOverrides = {};

    const crossref: ConfigOverrides['crossref'] = {};
    if (env['CROSSREF_EMAIL']) crossref.email = env['CROSSREF_EMAIL'];
    if (env['CROSSREF_BASE_URL']) crossref.baseUrl = env['CROSSREF_BASE_URL'];
    if (Object.keys(crossref).length > 0) overrides.crossref = crossref;

    const llm: ConfigOverrides['llm'] = {};
    if (env['OPENAI_MODEL']) llm.model = env['OPENAI_MODEL'];
    if (env['OPENAI_BASE_URL']) llm.baseUrl = env['OPENAI_BASE_URL'];
    if (Object.keys(llm).length > 0) overrides.llm = llm;

    if (env['CHROME_PATH']) overrides.download = { executablePath: env['CHROME_PATH'] };

    return overrides;
}

/**
 * Merge configuration from multiple sources.
 * Precedence: CLI flags > environment variables > config file > defaults
 */
export async function resolveConfig(
    cliFlags: ConfigOverrides,
    options: { searchFrom?: string; env?: NodeJS.ProcessEnv } = {}
): Promise<ExtractorConfig> {
    const fileConfig = await loadConfigFile(options.searchFrom);
    const envConfig = loadEnvVars(options.env);

    return mergeConfig(fileConfig ?? {}, envConfig, cliFlags);
}

/**
 * Merge override layers onto the defaults, later layers winning.
 * Nested sections are merged key by key; undefined values never override.
 */
export function mergeConfig(...layers: ConfigOverrides[]): ExtractorConfig {
    let merged: ExtractorConfig = {
        ...DEFAULT_CONFIG,
        crossref: { ...DEFAULT_CONFIG.crossref },
        llm: { ...DEFAULT_CONFIG.llm },
        download: { ...DEFAULT_CONFIG.download },
        retry: { ...DEFAULT_CONFIG.retry },
    };

    for (const layer of layers) {
        const { crossref, llm, download, retry, ...flat } = layer;
        merged = {
            ...merged,
            ...withoutUndefined(flat),
            crossref: { ...merged.crossref, ...withoutUndefined(crossref ?? {}) },
            llm: { ...merged.llm, ...withoutUndefined(llm ?? {}) },
            download: { ...merged.download, ...withoutUndefined(download ?? {}) },
            retry: { ...merged.retry, ...withoutUndefined(retry ?? {}) },
        };
    }

    return merged;
}

/**
 * Get API key from environment variable.
 * @param name - Environment variable name
 * @returns The API key or undefined
 */
export function getApiKey(name: string): string | undefined {
    return process.env[name] || undefined;
}

function withoutUndefined<T extends object>(value: T): Partial<T> {
    const result: Partial<T> = { ...value };
    for (const key in result) {
        if (result[key] === undefined) delete result[key];
    }
    return result;
}

function isRecord(value: unknown): value is ConfigOverrides {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}
