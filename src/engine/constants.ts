/// Fixed-point scale of the reward accumulator
export const SCALE = 10n ** 18n;

/// Synthetic share reserve each pool starts with under the bonding curve
export const INITIAL_RESERVE = 1_000_000_000n * 10n ** 18n;

/// Constant-product fee, expressed as numerator over FEE_DENOMINATOR (0.3%)
export const FEE_NUMERATOR = 997n;
export const FEE_DENOMINATOR = 1000n;

export const WEI_DECIMALS = 18;
