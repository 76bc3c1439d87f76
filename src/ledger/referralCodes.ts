import { randomInt } from "node:crypto";

// No 0/O, 1/I/L: codes get read aloud and retyped.
export const REFERRAL_CODE_ALPHABET = "ABCDEFGHJKMNPQRSTUVWXYZ23456789";
export const REFERRAL_CODE_LENGTH = 8;
export const REFERRAL_START_PREFIX = "ref_";

export type CodeGenerator = () => string;

export function generateReferralCode(nextIndex: (max: number) => number = randomInt): string {
  let code = "";
  for (let i = 0; i < REFERRAL_CODE_LENGTH; i++) {
    code += REFERRAL_CODE_ALPHABET.charAt(nextIndex(REFERRAL_CODE_ALPHABET.length));
  }
  return code;
}

export function isReferralCode(value: string): boolean {
  return new RegExp(`^[${REFERRAL_CODE_ALPHABET}]{${REFERRAL_CODE_LENGTH}}$`).test(value);
}

/** Extracts the code from a /start payload such as "ref_ABCD2345". */
export function parseReferralPayload(payload: string | undefined): string | null {
  const p = payload?.trim() ?? "";
  if (!p.startsWith(REFERRAL_START_PREFIX)) return null;
  const code = p.slice(REFERRAL_START_PREFIX.length).toUpperCase();
  return isReferralCode(code) ? code : null;
}

export function referralLink(botUsername: string, referralCode: string): string {
  return `https://t.me/${botUsername}?start=${REFERRAL_START_PREFIX}${referralCode}`;
}
