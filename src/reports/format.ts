/** Renders integer minor units with `decimals` fraction digits, trailing zeros dropped. */
export function formatMinorUnits(value: number | bigint, decimals = 2): string {
  const v = BigInt(value);
  if (decimals === 0) return v.toString();

  const negative = v < 0n;
  const abs = negative ? -v : v;
  const base = 10n ** BigInt(decimals);
  const whole = abs / base;
  const frac = abs % base;

  const fracStr = frac.toString().padStart(decimals, "0").replace(/0+$/, "");
  const out = fracStr ? `${whole.toString()}.${fracStr}` : whole.toString();
  return negative ? `-${out}` : out;
}

export function formatDate(d: Date | null): string {
  return d ? d.toISOString() : "";
}
