import { cleanText } from "../core/validation.js";

/** "-" leaves an optional field empty. */
export const SKIP_ANSWER = "-";

export type FormField<K extends string> = {
  key: K;
  prompt: string;
  maxLength: number;
  optional?: boolean;
  check?: (value: string) => boolean;
  invalid?: string;
};

export type FormDraft<K extends string> = { [P in K]?: string | null };

export type FormAnswer<K extends string> = { ok: true; next: K | null } | { ok: false; error: string };

/**
 * Stores one answer into the draft and names the next field, or null once the
 * form is filled in. The draft is left as it was on a rejected answer.
 */
export function applyFormAnswer<K extends string>(
  fields: readonly FormField<K>[],
  draft: FormDraft<K>,
  key: K,
  input: string
): FormAnswer<K> {
  const index = fields.findIndex((f) => f.key === key);
  const field = fields[index];
  if (index < 0 || !field) return { ok: false, error: `unknown form field ${key}` };

  if (field.optional && input.trim() === SKIP_ANSWER) {
    draft[key] = null;
  } else {
    const value = cleanText(input, field.maxLength);
    if (!value) return { ok: false, error: `Ответ должен быть непустым и не длиннее ${field.maxLength} символов.` };
    if (field.check && !field.check(value)) return { ok: false, error: field.invalid ?? "Некорректный ответ." };
    draft[key] = value;
  }
  return { ok: true, next: fields[index + 1]?.key ?? null };
}

export function promptFor<K extends string>(fields: readonly FormField<K>[], key: K): string {
  return fields.find((f) => f.key === key)?.prompt ?? "";
}
