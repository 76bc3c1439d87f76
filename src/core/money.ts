export const COMMISSION_RATE = 0.25;

/** Rounds to kopecks; every stored amount goes through here. */
export function roundMoney(value: number): number {
  return Math.round((value + Number.EPSILON) * 100) / 100;
}

export function isValidAmount(value: number): boolean {
  return Number.isFinite(value) && value > 0 && roundMoney(value) === value;
}

export function commissionFor(orderAmount: number, rate = COMMISSION_RATE): number {
  return roundMoney(orderAmount * rate);
}

/** pg returns NUMERIC columns as strings. */
export function fromNumeric(value: string | number | null): number {
  if (value === null) return 0;
  return roundMoney(Number(value));
}

export function formatMoney(value: number): string {
  const [int = "0", frac = "00"] = roundMoney(Math.abs(value)).toFixed(2).split(".");
  const grouped = int.replace(/\B(?=(\d{3})+(?!\d))/g, " ");
  return `${value < 0 ? "-" : ""}${grouped}.${frac}₽`;
}
