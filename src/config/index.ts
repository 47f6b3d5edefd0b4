// src/config/index.ts

/**
 * Runtime configuration, read once from the environment.
 * CLI flags override individual values per invocation.
 */
export interface AppConfig {
    /** winston level for every context logger. */
    logLevel: string;
    /** Port for the HTTP API (`serve` command and `npm run api`). */
    apiPort: number;
    /** Directory where `--report` writes timestamped text reports. */
    reportDirectory: string;
    /** When true, `main` is never listed among unused functions. */
    excludeEntryPoints: boolean;
    /** Body size limit handed to express.json(). */
    maxRequestBody: string;
}

function parsePort(value: string | undefined, fallback: number): number {
    if (!value) return fallback;
    const port = parseInt(value, 10);
    return Number.isInteger(port) && port > 0 ? port : fallback;
}

function parseFlag(value: string | undefined): boolean {
    return value !== undefined && ['1', 'true', 'yes'].includes(value.trim().toLowerCase());
}

const config: AppConfig = {
    logLevel: process.env.LOG_LEVEL || 'info',
    apiPort: parsePort(process.env.PORT, 8001),
    reportDirectory: process.env.REPORT_DIR || process.cwd(),
    excludeEntryPoints: parseFlag(process.env.EXCLUDE_ENTRY_POINTS),
    maxRequestBody: process.env.MAX_REQUEST_BODY || '2mb',
};

export default config;
