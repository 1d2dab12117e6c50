/**
 * Unit Tests for PasswordHash Value Object
 */

import { PasswordHash } from "../../src/domain/value-objects/PasswordHash";

describe("PasswordHash Value Object", () => {
  const encoded = "$argon2id$v=19$m=1024,t=2,p=1$c2FsdHNhbHQ$aGFzaGhhc2g";

  it("should expose the encoded hash", () => {
    expect(new PasswordHash(encoded).hash).toBe(encoded);
  });

  it("should throw error when hash is empty string", () => {
    expect(() => new PasswordHash("")).toThrow("Password hash is required");
  });

  it("should compare by encoded value", () => {
    expect(new PasswordHash(encoded).equals(new PasswordHash(encoded))).toBe(true);
    expect(new PasswordHash(encoded).equals(new PasswordHash("other"))).toBe(false);
  });

  it("should not leak the hash through JSON or string conversion", () => {
    const hash = new PasswordHash(encoded);
    expect(JSON.stringify({ hash })).toBe('{"hash":"[PasswordHash]"}');
    expect(`${hash}`).toBe("[PasswordHash]");
  });
});
