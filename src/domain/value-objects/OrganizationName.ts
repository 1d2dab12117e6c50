import { AppError, ErrorCode } from "../../shared/errors/AppError";

const NAME_PATTERN = /^[a-z0-9][a-z0-9_-]{2,49}$/;

/**
 * Organization names are case-insensitive: "Acme" and " acme " refer to the
 * same registry row. The normalized value also feeds the partition id, so the
 * character set is restricted to what is safe in a collection name.
 */
class OrganizationName {
  private _value: string;

  constructor(value: string) {
    const normalized = value.trim().toLowerCase();
    if (!NAME_PATTERN.test(normalized)) {
      throw AppError.fromErrorCode(ErrorCode.INVALID_ORGANIZATION_NAME);
    }
    this._value = normalized;
  }

  get value(): string {
    return this._value;
  }

  equals(other: OrganizationName): boolean {
    return this._value === other._value;
  }

  toString(): string {
    return this._value;
  }
}

export { OrganizationName, NAME_PATTERN };
