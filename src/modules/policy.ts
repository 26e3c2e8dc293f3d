import { DEFAULTS, PRECISION, WIDTHS } from "../config";
import { ParameterOutOfRangeError } from "../errors";
import { CapMode, PoolId } from "../types/common";
import { PolicyParameters, PolicyProvider } from "../types/policy";
import { fitsUint, maxUint } from "../utils/math";
import { validatePoolId } from "../utils/validation";

const MAX_BASE_FEE = Number(maxUint(WIDTHS.BASE_FEE));

function requireInteger(name: keyof PolicyParameters, value: number, min: number, max?: number): void {
  if (!Number.isInteger(value) || value < min || (max !== undefined && value > max)) {
    const bound = max === undefined ? `>= ${min}` : `in [${min}, ${max}]`;
    throw new ParameterOutOfRangeError(name, value, `must be an integer ${bound}`);
  }
}

/**
 * Check a full parameter set against its documented bounds.
 *
 * @throws {ParameterOutOfRangeError} On the first violated bound
 */
export function validatePolicy(params: PolicyParameters): void {
  requireInteger("targetCapsPerDay", params.targetCapsPerDay, 1);
  requireInteger("capBudgetDecayWindowSeconds", params.capBudgetDecayWindowSeconds, 1);
  if (params.freqScalingUnit <= 0n) {
    throw new ParameterOutOfRangeError("freqScalingUnit", params.freqScalingUnit, "must be positive");
  }
  requireInteger("minBaseFeePpm", params.minBaseFeePpm, 0, PRECISION.MAX_FEE_PPM);
  requireInteger("maxBaseFeePpm", params.maxBaseFeePpm, 0, PRECISION.MAX_FEE_PPM);
  if (params.minBaseFeePpm > params.maxBaseFeePpm) {
    throw new ParameterOutOfRangeError(
      "minBaseFeePpm",
      params.minBaseFeePpm,
      `must not exceed maxBaseFeePpm (${params.maxBaseFeePpm})`,
    );
  }
  requireInteger("maxStepPpm", params.maxStepPpm, 0, PRECISION.MAX_FEE_PPM);
  requireInteger("baseFeeUpdateIntervalSeconds", params.baseFeeUpdateIntervalSeconds, 0);
  requireInteger("surgeDecayPeriodSeconds", params.surgeDecayPeriodSeconds, 0);
  requireInteger("surgeFeeMultiplierPpm", params.surgeFeeMultiplierPpm, 0, MAX_BASE_FEE);
  if (!fitsUint(params.maxAbsTickMove, WIDTHS.TICK) || !Number.isInteger(params.maxAbsTickMove)) {
    throw new ParameterOutOfRangeError(
      "maxAbsTickMove",
      params.maxAbsTickMove,
      `must be an integer in [0, 2^${WIDTHS.TICK})`,
    );
  }
  requireInteger("baseFeeFactorPpm", params.baseFeeFactorPpm, 0);
  requireInteger("defaultBaseFeePpm", params.defaultBaseFeePpm, 0, PRECISION.MAX_FEE_PPM);
  if (params.capMode !== CapMode.STEP && params.capMode !== CapMode.BLOCK) {
    throw new ParameterOutOfRangeError("capMode", params.capMode, "must be 'step' or 'block'");
  }
  if (params.capMode === CapMode.BLOCK) {
    requireInteger("blockDurationSeconds", params.blockDurationSeconds, 1);
  }
}

/**
 * In-memory policy collaborator: global defaults plus per-pool overrides.
 */
export class StaticPolicyProvider implements PolicyProvider {
  private readonly defaults: PolicyParameters;
  private readonly overrides = new Map<PoolId, Partial<PolicyParameters>>();

  constructor(
    defaults: Partial<PolicyParameters> = {},
    overrides: Record<string, Partial<PolicyParameters>> = {},
  ) {
    this.defaults = { ...DEFAULTS, ...defaults };
    validatePolicy(this.defaults);
    for (const [pool, override] of Object.entries(overrides)) {
      this.setPoolOverride(pool, override);
    }
  }

  /**
   * Resolved parameters for a pool: its override merged over the defaults.
   */
  getParameters(pool: PoolId): PolicyParameters {
    const override = this.overrides.get(validatePoolId(pool));
    return override ? { ...this.defaults, ...override } : { ...this.defaults };
  }

  getDefaults(): PolicyParameters {
    return { ...this.defaults };
  }

  /**
   * Replace a pool's override. The merged result is validated before it is stored.
   *
   * @throws {ParameterOutOfRangeError} If the merged parameters are invalid
   */
  setPoolOverride(pool: PoolId, override: Partial<PolicyParameters>): void {
    const key = validatePoolId(pool);
    validatePolicy({ ...this.defaults, ...override });
    this.overrides.set(key, { ...override });
  }

  clearPoolOverride(pool: PoolId): boolean {
    return this.overrides.delete(validatePoolId(pool));
  }

  getMinBaseFee(pool: PoolId): number {
    return this.getParameters(pool).minBaseFeePpm;
  }

  getMaxBaseFee(pool: PoolId): number {
    return this.getParameters(pool).maxBaseFeePpm;
  }

  getMaxAbsTickMove(pool: PoolId): number {
    return this.getParameters(pool).maxAbsTickMove;
  }

  getSurgeDecayPeriodSeconds(pool: PoolId): number {
    return this.getParameters(pool).surgeDecayPeriodSeconds;
  }

  getSurgeFeeMultiplierPpm(pool: PoolId): number {
    return this.getParameters(pool).surgeFeeMultiplierPpm;
  }

  getTargetCapsPerDay(pool: PoolId): number {
    return this.getParameters(pool).targetCapsPerDay;
  }
}
