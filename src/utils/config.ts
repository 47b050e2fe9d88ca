import { z } from "zod";
import type { CurveConfig } from "../config/curve-config";
import { isAddress, type Address } from "./address";
import { parseUnits } from "./units";

export interface AppConfig {
    curve: Partial<CurveConfig>;
    feeCollector?: Address;
    liquidityCollector?: Address;
    priceFeedUrl?: string;
    creationFee?: bigint;
}

const decimalAmount = z.string().trim().regex(/^\d+(\.\d+)?$/, "expected a decimal amount").transform(v => parseUnits(v));
const wholeNumber = z.string().trim().regex(/^\d+$/, "expected a whole number").transform(v => BigInt(v));
const address = z.string().trim().refine(isAddress, "expected 0x followed by 40 hex characters");

// Zod schema for environment validation; unset variables fall back to the curve defaults
const envSchema = z.object({
    CURVE_TOTAL_SUPPLY: decimalAmount.optional(),
    CURVE_SALE_THRESHOLD: decimalAmount.optional(),
    CURVE_RAISE_TARGET_USD: decimalAmount.optional(),
    CURVE_INITIAL_MULTIPLIER: wholeNumber.optional(),
    CURVE_FINAL_MULTIPLIER: wholeNumber.optional(),
    CURVE_FEE_PERCENT: wholeNumber.optional(),
    CURVE_DEPLOY_UNITS: decimalAmount.optional(),
    CURVE_DEPLOY_SETTLEMENT: decimalAmount.optional(),
    CURVE_DEPLOY_FEE_SETTLEMENT: decimalAmount.optional(),
    ORACLE_UPDATE_INTERVAL_SEC: z.coerce.number().int().nonnegative().optional(),
    PRICE_FRACTION_POLICY: z.enum(["extrapolate", "clamp"]).optional(),
    RAISED_VALUE_BASIS: z.enum(["gross", "net"]).optional(),
    FEE_COLLECTOR_ADDRESS: address.optional(),
    LIQUIDITY_COLLECTOR_ADDRESS: address.optional(),
    PRICE_FEED_URL: z.string().url().optional(),
    CREATION_FEE: decimalAmount.optional(),
});

type EnvVars = z.infer<typeof envSchema>;

/** Blank variables count as unset. */
function withoutBlanks(env: NodeJS.ProcessEnv): Record<string, string> {
    const out: Record<string, string> = {};
    for (const [k, v] of Object.entries(env)) {
        if (v !== undefined && v.trim() !== "") out[k] = v;
    }
    return out;
}

function toCurveOverrides(env: EnvVars): Partial<CurveConfig> {
    const curve: Partial<CurveConfig> = {};
    if (env.CURVE_TOTAL_SUPPLY !== undefined) curve.totalSupply = env.CURVE_TOTAL_SUPPLY;
    if (env.CURVE_SALE_THRESHOLD !== undefined) curve.saleThreshold = env.CURVE_SALE_THRESHOLD;
    if (env.CURVE_RAISE_TARGET_USD !== undefined) curve.raiseTargetUSD = env.CURVE_RAISE_TARGET_USD;
    if (env.CURVE_INITIAL_MULTIPLIER !== undefined) curve.initialMultiplier = env.CURVE_INITIAL_MULTIPLIER;
    if (env.CURVE_FINAL_MULTIPLIER !== undefined) curve.finalMultiplier = env.CURVE_FINAL_MULTIPLIER;
    if (env.CURVE_FEE_PERCENT !== undefined) curve.feePercent = env.CURVE_FEE_PERCENT;
    if (env.CURVE_DEPLOY_UNITS !== undefined) curve.deployUnits = env.CURVE_DEPLOY_UNITS;
    if (env.CURVE_DEPLOY_SETTLEMENT !== undefined) curve.deploySettlement = env.CURVE_DEPLOY_SETTLEMENT;
    if (env.CURVE_DEPLOY_FEE_SETTLEMENT !== undefined) curve.deployFeeSettlement = env.CURVE_DEPLOY_FEE_SETTLEMENT;
    if (env.ORACLE_UPDATE_INTERVAL_SEC !== undefined) curve.oracleUpdateIntervalSec = env.ORACLE_UPDATE_INTERVAL_SEC;
    if (env.PRICE_FRACTION_POLICY !== undefined) curve.priceFractionPolicy = env.PRICE_FRACTION_POLICY;
    if (env.RAISED_VALUE_BASIS !== undefined) curve.raisedValueBasis = env.RAISED_VALUE_BASIS;
    return curve;
}

let __cachedAppConfig: AppConfig | null = null;
export function loadAppConfig(): AppConfig {
    if (__cachedAppConfig) return __cachedAppConfig;
    const env = envSchema.parse(withoutBlanks(process.env));
    __cachedAppConfig = {
        curve: toCurveOverrides(env),
        feeCollector: env.FEE_COLLECTOR_ADDRESS,
        liquidityCollector: env.LIQUIDITY_COLLECTOR_ADDRESS,
        priceFeedUrl: env.PRICE_FEED_URL,
        creationFee: env.CREATION_FEE,
    };
    return __cachedAppConfig;
}

/**
 * Test helper: reset cached app config so subsequent calls re-read env.
 */
export function resetConfigCache(){
    __cachedAppConfig = null;
}
