import { WEI_DECIMALS } from "../engine/constants";

const DECIMAL_PATTERN = /^(\d+)(?:\.(\d+))?$/;

/**
 * Convert a decimal ether string ("2.3") to wei without going through
 * floating point. Returns null for anything that is not a plain
 * non-negative decimal with at most 18 fractional digits.
 */
export function parseEther(value: string): bigint | null {
  const match = DECIMAL_PATTERN.exec(value.trim());
  if (!match) {
    return null;
  }
  const whole = match[1];
  const fraction = match[2] ?? "";
  if (fraction.length > WEI_DECIMALS) {
    return null;
  }
  return (
    BigInt(whole) * 10n ** BigInt(WEI_DECIMALS) +
    BigInt(fraction.padEnd(WEI_DECIMALS, "0"))
  );
}

/**
 * Wei to a decimal ether string with trailing zeros trimmed
 */
export function formatEther(wei: bigint): string {
  const negative = wei < 0n;
  const abs = negative ? -wei : wei;
  const base = 10n ** BigInt(WEI_DECIMALS);
  const whole = abs / base;
  const fraction = (abs % base)
    .toString()
    .padStart(WEI_DECIMALS, "0")
    .replace(/0+$/, "");
  return `${negative ? "-" : ""}${whole}${fraction ? `.${fraction}` : ""}`;
}
