export function formatPrice(value: number, precision = 2): string {
  if (!Number.isFinite(value)) {
    return "-";
  }
  return `$${value.toFixed(precision)}`;
}

export function formatSigned(value: number, precision = 2, suffix = ""): string {
  if (!Number.isFinite(value)) {
    return "-";
  }
  const prefix = value > 0 ? "+" : "";
  return `${prefix}${value.toFixed(precision)}${suffix}`;
}

export function formatCurrency(amount: number, precision = 2): string {
  if (!Number.isFinite(amount)) {
    return "-";
  }
  if (amount >= 1_000_000_000_000) {
    return `$${(amount / 1_000_000_000_000).toFixed(precision)}T`;
  }
  if (amount >= 1_000_000_000) {
    return `$${(amount / 1_000_000_000).toFixed(precision)}B`;
  }
  if (amount >= 1_000_000) {
    return `$${(amount / 1_000_000).toFixed(precision)}M`;
  }
  if (amount >= 1_000) {
    return `$${(amount / 1_000).toFixed(precision)}K`;
  }
  return `$${amount.toFixed(precision)}`;
}

export function formatVolume(volume: number, precision = 1): string {
  if (!Number.isFinite(volume)) {
    return "-";
  }
  if (volume >= 1_000_000_000) {
    return `${(volume / 1_000_000_000).toFixed(precision)}B`;
  }
  if (volume >= 1_000_000) {
    return `${(volume / 1_000_000).toFixed(precision)}M`;
  }
  if (volume >= 1_000) {
    return `${(volume / 1_000).toFixed(precision)}K`;
  }
  return String(volume);
}
