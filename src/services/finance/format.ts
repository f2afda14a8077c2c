// Text formatting shared by the analysis renderers

const currencyFormatter = new Intl.NumberFormat('en-US', {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

const wholeCurrencyFormatter = new Intl.NumberFormat('en-US', {
  maximumFractionDigits: 0,
});

export function formatCurrency(amount: number): string {
  return `$${currencyFormatter.format(amount)}`;
}

export function formatWholeCurrency(amount: number): string {
  return `$${wholeCurrencyFormatter.format(amount)}`;
}

/** 0.85 -> "85%" */
export function formatPercent(fraction: number, digits = 0): string {
  return `${(fraction * 100).toFixed(digits)}%`;
}

/** "very_aggressive" -> "Very Aggressive" */
export function titleCase(value: string): string {
  return value
    .split(/[_\s]+/)
    .filter(Boolean)
    .map(word => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(' ');
}

export function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}
