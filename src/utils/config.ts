import { z } from "zod";
import type { AlmaTrendParams } from "../contracts";

export interface AlmaTrendConfig {
    params: AlmaTrendParams;
    minKlines: number;
    legacyBearTrend: boolean;
}

function isTruthyEnv(value?: string): boolean {
    if (!value) return false;
    return ["1", "true", "yes", "on"].includes(value.toLowerCase());
}

const num = (def: number) => z.string().optional().transform(v => (v === undefined || v.trim() === "" ? def : Number(v)));

// Zod schema for environment validation
const envSchema = z.object({
    ALMA_LEN: num(5).pipe(z.number().int().positive()),
    ALMA_OFFSET: num(0.85).pipe(z.number().min(0).max(1)),
    ALMA_SIGMA: num(2.75).pipe(z.number().finite().positive()),
    ALMA_SD_LEN: num(20).pipe(z.number().int().min(2)),
    ALMA_FACTOR: num(1.8).pipe(z.number().finite().positive()),
    MIN_KLINES_REQUIRED: num(100).pipe(z.number().int().min(3)),
    LEGACY_BEAR_TREND: z.string().optional().transform(isTruthyEnv),
});

let __cachedConfig: AlmaTrendConfig | null = null;

/**
 * Indicator configuration from the environment, parsed once and cached.
 * Throws a ZodError when a variable is present but invalid.
 */
export function loadAlmaTrendConfig(env: NodeJS.ProcessEnv = process.env): AlmaTrendConfig {
    if (__cachedConfig) return __cachedConfig;
    const e = envSchema.parse(env);
    __cachedConfig = {
        params: {
            filter: { length: e.ALMA_LEN, offset: e.ALMA_OFFSET, sigma: e.ALMA_SIGMA },
            dispersionWindow: e.ALMA_SD_LEN,
            bandFactor: e.ALMA_FACTOR,
        },
        minKlines: e.MIN_KLINES_REQUIRED,
        legacyBearTrend: e.LEGACY_BEAR_TREND,
    };
    return __cachedConfig;
}

/**
 * Test helper: reset cached config so subsequent calls re-read env.
 */
export function resetConfigCache() {
    __cachedConfig = null;
}
