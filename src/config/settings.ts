/**
 * @file Postcard Settings Service
 *
 * Runtime settings for postcard presenters with central validation and
 * deterministic precedence (override > env > defaults).
 *
 * @module
 */

import { LOG_LEVELS, logLevel_check, type LogLevel } from '../logging/log.js';

/** Which toggle outcome drives the star revert path. */
export type RevertTrigger = 'failure' | 'success';

export interface ResolvedPostcardSettings {
    /** Artificial delay before each toggle-star request. */
    apiDelay_ms: number;
    revertOn: RevertTrigger;
    logLevel: LogLevel;
}

export type PostcardSettings = Partial<ResolvedPostcardSettings>;

export type SettingsKey = keyof ResolvedPostcardSettings;

export type SettingSource = 'override' | 'env' | 'default';

export type SettingsResult<K extends SettingsKey> =
    | { ok: true; value: ResolvedPostcardSettings[K] }
    | { ok: false; error: string };

type EnvReader = (key: string) => string | undefined;

interface NumericBounds {
    min: number;
    max: number;
}

const ENV_KEYS: Record<SettingsKey, string> = {
    apiDelay_ms: 'POSTCARD_API_DELAY_MS',
    revertOn: 'POSTCARD_REVERT_ON',
    logLevel: 'POSTCARD_LOG_LEVEL'
};

const REVERT_TRIGGERS: readonly RevertTrigger[] = ['failure', 'success'];

function processEnv_read(key: string): string | undefined {
    return process.env[key];
}

function revertTrigger_check(value: string): value is RevertTrigger {
    return REVERT_TRIGGERS.some((trigger: RevertTrigger): boolean => trigger === value);
}

export class PostcardSettingsService {
    private readonly overrides: PostcardSettings = {};
    private readonly defaults: ResolvedPostcardSettings = {
        apiDelay_ms: 0,
        revertOn: 'failure',
        logLevel: 'warn'
    };
    private readonly delayBounds: NumericBounds = { min: 0, max: 10_000 };

    /**
     * @param env_read - Environment lookup; defaults to `process.env`.
     */
    constructor(private readonly env_read: EnvReader = processEnv_read) {}

    /**
     * Return effective settings.
     */
    snapshot(): ResolvedPostcardSettings {
        return {
            apiDelay_ms: this.apiDelay_resolve(),
            revertOn: this.revertOn_resolve(),
            logLevel: this.logLevel_resolve()
        };
    }

    /**
     * Return currently held overrides (without env/default resolution).
     */
    overrides_get(): PostcardSettings {
        return { ...this.overrides };
    }

    /**
     * Set one override with validation.
     */
    set<K extends SettingsKey>(key: K, value: unknown): SettingsResult<K>;
    set(key: SettingsKey, value: unknown): SettingsResult<SettingsKey> {
        switch (key) {
            case 'apiDelay_ms': {
                const parsed: number | undefined = this.numeric_parse(value);
                if (parsed === undefined) {
                    return { ok: false, error: `Invalid value for ${key}: ${String(value)}` };
                }
                const clamped: number = this.delay_clamp(parsed);
                this.overrides.apiDelay_ms = clamped;
                return { ok: true, value: clamped };
            }
            case 'revertOn': {
                const text: string = String(value);
                if (!revertTrigger_check(text)) {
                    return { ok: false, error: `Invalid value for ${key}: ${text} (expected ${REVERT_TRIGGERS.join(' | ')})` };
                }
                this.overrides.revertOn = text;
                return { ok: true, value: text };
            }
            case 'logLevel': {
                const text: string = String(value);
                if (!logLevel_check(text)) {
                    return { ok: false, error: `Invalid value for ${key}: ${text} (expected ${LOG_LEVELS.join(' | ')})` };
                }
                this.overrides.logLevel = text;
                return { ok: true, value: text };
            }
            default:
                return { ok: false, error: `Unknown setting key: ${String(key)}` };
        }
    }

    /**
     * Remove one override.
     */
    unset(key: SettingsKey): void {
        delete this.overrides[key];
    }

    /**
     * Resolve where the effective value of a setting comes from.
     */
    source(key: SettingsKey): SettingSource {
        if (this.overrides[key] !== undefined) return 'override';
        if (this.envValue_resolve(key) !== undefined) return 'env';
        return 'default';
    }

    apiDelay_resolve(): number {
        if (this.overrides.apiDelay_ms !== undefined) return this.overrides.apiDelay_ms;
        const fromEnv: number | undefined = this.envValue_resolve('apiDelay_ms');
        return fromEnv ?? this.defaults.apiDelay_ms;
    }

    revertOn_resolve(): RevertTrigger {
        return this.overrides.revertOn ?? this.envValue_resolve('revertOn') ?? this.defaults.revertOn;
    }

    logLevel_resolve(): LogLevel {
        return this.overrides.logLevel ?? this.envValue_resolve('logLevel') ?? this.defaults.logLevel;
    }

    /**
     * Read and validate one environment override. Invalid values are ignored.
     */
    private envValue_resolve<K extends SettingsKey>(key: K): ResolvedPostcardSettings[K] | undefined;
    private envValue_resolve(key: SettingsKey): ResolvedPostcardSettings[SettingsKey] | undefined {
        const raw: string | undefined = this.env_read(ENV_KEYS[key])?.trim();
        if (!raw) return undefined;

        switch (key) {
            case 'apiDelay_ms': {
                const parsed: number | undefined = this.numeric_parse(raw);
                return parsed === undefined ? undefined : this.delay_clamp(parsed);
            }
            case 'revertOn':
                return revertTrigger_check(raw) ? raw : undefined;
            case 'logLevel':
                return logLevel_check(raw) ? raw : undefined;
        }
    }

    private numeric_parse(value: unknown): number | undefined {
        const parsed: number = typeof value === 'number' ? value : Number.parseInt(String(value), 10);
        return Number.isFinite(parsed) ? Math.round(parsed) : undefined;
    }

    private delay_clamp(value: number): number {
        return Math.max(this.delayBounds.min, Math.min(this.delayBounds.max, value));
    }
}
