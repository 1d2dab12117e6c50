/**
 * Unit Tests for Email Value Object
 */

import { Email } from "../../src/domain/value-objects/Email";
import { AppError, ErrorCode } from "../../src/shared/errors/AppError";
import { captureError } from "../utils/test-helpers";

describe("Email Value Object", () => {
  describe("Creation", () => {
    it("should create an email with standard format", () => {
      const email = new Email("admin@acme.com");
      expect(email.value).toBe("admin@acme.com");
    });

    it("should keep plus addressing and subdomains", () => {
      const email = new Email("ops+alerts@mail.acme.com");
      expect(email.value).toBe("ops+alerts@mail.acme.com");
    });

    it("should trim and lowercase the address", () => {
      const email = new Email("  Admin@ACME.com ");
      expect(email.value).toBe("admin@acme.com");
    });
  });

  describe("with invalid email formats", () => {
    it.each(["", "adminacme.com", "@acme.com", "admin@", "admin@acme", "a b@acme.com"])(
      "should reject %p",
      (input) => {
        expect(() => new Email(input)).toThrow("Invalid email format");
      },
    );

    it("should throw an AppError with INVALID_EMAIL", () => {
      const error = captureError(() => new Email("not-an-email"));
      expect(error).toBeInstanceOf(AppError);
      expect(error).toMatchObject({
        code: ErrorCode.INVALID_EMAIL,
        statusCode: 400,
      });
    });
  });

  describe("normalize", () => {
    it("should trim and lowercase without validating", () => {
      expect(Email.normalize("  NOT AN EMAIL ")).toBe("not an email");
    });
  });

  describe("equals", () => {
    it("should treat different casing as equal", () => {
      expect(new Email("admin@acme.com").equals(new Email("ADMIN@acme.com"))).toBe(
        true,
      );
    });

    it("should return false for different addresses", () => {
      expect(new Email("admin@acme.com").equals(new Email("ops@acme.com"))).toBe(
        false,
      );
    });
  });

  it("toString should return the normalized value", () => {
    expect(new Email("Admin@Acme.com").toString()).toBe("admin@acme.com");
  });
});
