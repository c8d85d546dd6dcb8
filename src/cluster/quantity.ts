const SUFFIX_MULTIPLIERS: Record<string, number> = {
  "": 1,
  m: 1e-3,
  k: 1e3,
  M: 1e6,
  G: 1e9,
  T: 1e12,
  P: 1e15,
  Ki: 2 ** 10,
  Mi: 2 ** 20,
  Gi: 2 ** 30,
  Ti: 2 ** 40,
  Pi: 2 ** 50,
};

const QUANTITY_RE = /^([+-]?(?:\d+\.?\d*|\.\d+))(?:[eE]([+-]?\d+))?(m|k|M|G|T|P|Ki|Mi|Gi|Ti|Pi)?$/;

/**
 * Parse a Kubernetes resource quantity ("2", "500m", "64Gi", "1e3").
 * Returns null for anything that is not a quantity.
 */
export function parseQuantity(value: string | number): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  const match = QUANTITY_RE.exec(value.trim());
  if (!match) return null;
  const [, mantissa, exponent, suffix] = match;
  if (exponent !== undefined && suffix !== undefined) return null;
  const base = Number(mantissa) * (exponent === undefined ? 1 : 10 ** Number(exponent));
  const multiplier = SUFFIX_MULTIPLIERS[suffix ?? ""] ?? 1;
  const result = base * multiplier;
  return Number.isFinite(result) ? result : null;
}
