import validator from "validator";
import { AppError, ErrorCode } from "../../shared/errors/AppError";

class Email {
  private _value: string;

  constructor(value: string) {
    const normalized = Email.normalize(value);
    if (!validator.isEmail(normalized)) {
      throw AppError.fromErrorCode(ErrorCode.INVALID_EMAIL);
    }
    this._value = normalized;
  }

  /**
   * Canonical lookup form: trimmed and lower-cased. Does not validate.
   */
  static normalize(value: string): string {
    return value.trim().toLowerCase();
  }

  get value(): string {
    return this._value;
  }

  equals(other: Email): boolean {
    return this._value === other._value;
  }

  toString(): string {
    return this._value;
  }
}

export { Email };
