const UNITS = [
  { label: 'd', ms: 1000 * 60 * 60 * 24 },
  { label: 'h', ms: 1000 * 60 * 60 },
  { label: 'm', ms: 1000 * 60 },
  { label: 's', ms: 1000 },
];

export function formatPrice(amount: number, places = 2): string {
  return `₹${formatPlain(amount, places)}`;
}

export function formatStrike(strike: number): string {
  return Number.isInteger(strike) ? String(strike) : strike.toFixed(2);
}

export function formatClock(date: Date): string {
  const pad = (value: number) => String(value).padStart(2, '0');
  return `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

export function formatTimeLeft(startDate: Date, endDate: Date): string {
  let diff = endDate.getTime() - startDate.getTime();
  if (diff <= 0) return 'now';

  const result: string[] = [];
  let unitsUsed = 0;

  for (const unit of UNITS) {
    if (unitsUsed >= 2) break;
    const value = Math.floor(diff / unit.ms);
    if (value > 0) {
      result.push(`${value}${unit.label}`);
      diff -= value * unit.ms;
      unitsUsed++;
    }
  }

  return result.length > 0 ? result.join(' ') : 'now';
}

export function escapeHtml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

function formatPlain(amount: number, places = 2): string {
  return amount.toFixed(places).replace(/\.00$/, '');
}
