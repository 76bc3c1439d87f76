export function normalizeCardNumber(input: string): string | null {
  const digits = input.replace(/[\s-]/g, "");
  return /^\d{16}$/.test(digits) ? digits : null;
}

export function maskCardNumber(digits: string): string {
  return `${digits.slice(0, 4)} **** **** ${digits.slice(-4)}`;
}

export function normalizeSbpPhone(input: string): string | null {
  const phone = input.replace(/[\s\-()]/g, "");
  return /^\+7\d{10}$/.test(phone) ? phone : null;
}

export function isFullName(input: string): boolean {
  return input.trim().split(/\s+/).filter(Boolean).length >= 2;
}

/** Accepts "40000", "40 000", "40000.50" and "40000,50". */
export function parsePrice(input: string): number | null {
  const cleaned = input.replace(/[\s₽]/g, "").replace(",", ".");
  if (!/^\d+(\.\d{1,2})?$/.test(cleaned)) return null;
  const n = Number(cleaned);
  return n > 0 ? n : null;
}

export function cleanText(input: string, maxLength: number): string | null {
  const text = input.trim();
  if (!text || text.length > maxLength) return null;
  return text;
}

export function isHttpUrl(input: string): boolean {
  let url: URL;
  try {
    url = new URL(input);
  } catch {
    return false;
  }
  return url.protocol === "https:" || url.protocol === "http:";
}
