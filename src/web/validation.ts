/**
 * Form validation: field validators and the engine that applies them to a
 * submitted form.
 */
import { isDateValid, remainingTime } from "./format.ts";

export type FieldValues = Record<string, string>;
export type FormErrors = Record<string, string>;

/** Returns an error message, or undefined when the value is acceptable. */
export type Validator = (value: string) => string | undefined;
export type ValidationRules = Readonly<Record<string, Validator>>;

export const REQUIRED_MESSAGE = "Заполните это поле";
export const EMAIL_TAKEN_MESSAGE = "Пользователь с этим email уже зарегистрирован";

export const MIN_LOT_DURATION_HOURS = 24;
export const TOO_LARGE_MESSAGE = "Слишком большое значение";
export const IMAGE_EXTENSIONS: readonly string[] = ["jpg", "jpeg", "png"];

const EMAIL_RE =
  /^[A-Za-z0-9!#$%&'*+/=?^_`{|}~-]+(?:\.[A-Za-z0-9!#$%&'*+/=?^_`{|}~-]+)*@(?:[A-Za-z0-9](?:[A-Za-z0-9-]{0,61}[A-Za-z0-9])?\.)+[A-Za-z]{2,63}$/;
const DECIMAL_RE = /^\d+(?:\.\d+)?$/;
const INTEGER_RE = /^\d+$/;

// Amounts are kept as JS numbers; whole rubles must stay exact
function isTooLarge(v: string): boolean {
  return !Number.isSafeInteger(Math.ceil(Number(v)));
}

/**
 * Validates a submitted form.
 *
 * Only the fields present in `fields` are checked: a required name that is
 * missing from the mapping is not reported, so callers build the mapping
 * with {@link readFields}. An empty (after trim) required field gets
 * {@link REQUIRED_MESSAGE} and its rule is skipped.
 */
export function validateForm(
  fields: FieldValues,
  rules: ValidationRules,
  required: readonly string[]
): FormErrors {
  const errors: FormErrors = {};
  for (const [name, value] of Object.entries(fields)) {
    if (required.includes(name) && value.trim() === "") {
      errors[name] = REQUIRED_MESSAGE;
      continue;
    }
    const rule = rules[name];
    if (!rule) continue;
    const message = rule(value);
    if (message) errors[name] = message;
  }
  return errors;
}

export function isValid(errors: FormErrors): boolean {
  return Object.keys(errors).length === 0;
}

/**
 * Collect the named text fields from submitted form data. Names that were not
 * submitted (or were submitted as files) map to "".
 */
export function readFields(form: FormData, names: readonly string[]): FieldValues {
  const fields: FieldValues = {};
  for (const name of names) {
    const v = form.get(name);
    fields[name] = typeof v === "string" ? v : "";
  }
  return fields;
}

/** Runs validators in order and returns the first message. */
export function composeValidators(...validators: Validator[]): Validator {
  return (value) => {
    for (const validate of validators) {
      const message = validate(value);
      if (message) return message;
    }
    return undefined;
  };
}

export function validateEmail(value: string): string | undefined {
  if (!EMAIL_RE.test(value.trim())) {
    return "Введите корректный email";
  }
  return undefined;
}

/**
 * Build an email validator that rejects addresses already owned by an account.
 * `isTaken` is the row-existence lookup, e.g. `(email) => emailExists(db, email)`.
 */
export function createEmailAvailabilityValidator(isTaken: (email: string) => boolean): Validator {
  return (value) => {
    if (isTaken(value.trim())) {
      return EMAIL_TAKEN_MESSAGE;
    }
    return undefined;
  };
}

export function validatePrice(value: string): string | undefined {
  const v = value.trim();
  if (!DECIMAL_RE.test(v) || Number(v) <= 0) {
    return "Значение должно быть числом больше 0";
  }
  if (isTooLarge(v)) return TOO_LARGE_MESSAGE;
  return undefined;
}

export function validateBidStep(value: string): string | undefined {
  const v = value.trim();
  if (!INTEGER_RE.test(v) || Number(v) <= 0) {
    return "Значение должно быть целым числом больше 0";
  }
  if (isTooLarge(v)) return TOO_LARGE_MESSAGE;
  return undefined;
}

/** The lot end date must be a `YYYY-MM-DD` date at least a day after `now`. */
export function validateEndDate(value: string, now: Date = new Date()): string | undefined {
  const v = value.trim();
  if (!isDateValid(v)) {
    return "Введите дату в формате ГГГГ-ММ-ДД";
  }
  const [hours] = remainingTime(v, now);
  if (Number(hours) < MIN_LOT_DURATION_HOURS) {
    return "Дата должна быть больше текущей даты хотя бы на 1 день.";
  }
  return undefined;
}

export function validateCategoryId(value: string, allowed: ReadonlySet<string>): string | undefined {
  if (!allowed.has(value.trim())) {
    return "Выберите категорию из списка";
  }
  return undefined;
}

export function getExtension(filename: string): string {
  const i = filename.lastIndexOf(".");
  return i >= 0 ? filename.slice(i + 1).toLowerCase() : "";
}

export function validateImageName(filename: string): string | undefined {
  if (!IMAGE_EXTENSIONS.includes(getExtension(filename))) {
    return "Загрузите картинку в формате JPG, JPEG или PNG";
  }
  return undefined;
}

export function validateImageSize(size: number, maxBytes: number): string | undefined {
  if (size > maxBytes) {
    return "Картинка слишком большая";
  }
  return undefined;
}

/** A bid must be a whole number of at least `min`. */
export function validateBidAmount(value: string, min: number): string | undefined {
  const v = value.trim();
  if (!INTEGER_RE.test(v) || Number(v) < min) {
    return `Ставка должна быть не меньше ${min}`;
  }
  if (isTooLarge(v)) return TOO_LARGE_MESSAGE;
  return undefined;
}
