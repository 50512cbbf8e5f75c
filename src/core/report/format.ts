/**
 * Number formatting shared by the report and the console summary
 */

import type { PriceChange } from "../compare/index";

/** +4, -3, +0 */
export const signed = (n: number, digits?: number): string =>
  (n >= 0 ? "+" : "") + (digits === undefined ? String(n) : n.toFixed(digits));

export const arrow = (delta: number): string =>
  delta > 0 ? "↑" : delta < 0 ? "↓" : "→";

/** "125 → 129 kr (+4 kr, +3.2%)"; the percent is left out when unknown */
export function describeChange(c: PriceChange): string {
  if (c.previous === null || c.delta === null) return `${c.current} kr`;
  const pct = c.percent === null ? "" : `, ${signed(c.percent, 1)}%`;
  return `${c.previous} → ${c.current} kr (${signed(c.delta)} kr${pct})`;
}
