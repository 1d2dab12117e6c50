/**
 * Encoded argon2 hash of an admin password. Hashing and verification live in
 * PasswordService so the work factors come from configuration.
 */
class PasswordHash {
  private _hash: string;

  constructor(hash: string) {
    if (!hash) {
      throw new Error("Password hash is required");
    }
    this._hash = hash;
  }

  get hash(): string {
    return this._hash;
  }

  equals(other: PasswordHash): boolean {
    return this._hash === other._hash;
  }

  // Keeps the hash out of JSON serialization and string interpolation.
  toJSON(): string {
    return "[PasswordHash]";
  }

  toString(): string {
    return "[PasswordHash]";
  }
}

export { PasswordHash };
