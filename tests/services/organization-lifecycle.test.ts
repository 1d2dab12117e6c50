/**
 * Unit Tests for OrganizationLifecycleManager
 *
 * Tests cover:
 * - Registry/partition consistency after every successful transition
 * - Compensation when the partition step fails
 * - Bearer token gating on delete
 */

import { ErrorCode } from "../../src/shared/errors/AppError";
import {
  TestContext,
  createTestContext,
  signExpiredToken,
  signForeignToken,
} from "../utils/test-helpers";

describe("OrganizationLifecycleManager", () => {
  let ctx: TestContext;
  let consoleError: jest.SpyInstance;

  const acme = {
    organizationName: "Acme",
    email: "Admin@Acme.com",
    password: "s3cret-pass",
  };

  beforeEach(() => {
    ctx = createTestContext();
    consoleError = jest.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  const tokenFor = async (name: string): Promise<string> => {
    const organization = await ctx.repository.findByName(name);
    if (!organization) {
      throw new Error(`fixture organization ${name} missing`);
    }
    return ctx.credentials.issueToken(organization.admin.id, organization.name.value)
      .token;
  };

  describe("create", () => {
    it("should register the organization and provision its partition", async () => {
      const created = await ctx.lifecycle.create(acme);

      expect(created.name.value).toBe("acme");
      expect(created.partitionId).toBe("org_acme");
      expect(created.admin.email.value).toBe("admin@acme.com");
      expect(created.createdAt).toEqual(created.updatedAt);

      const stored = await ctx.repository.findByName("acme");
      expect(stored?.id).toBe(created.id);
      expect(ctx.backend.partitionIds()).toEqual(["org_acme"]);
    });

    it("should store a hash that verifies the password", async () => {
      const created = await ctx.lifecycle.create(acme);

      expect(created.admin.passwordHash.hash).not.toContain("s3cret-pass");
      await expect(
        ctx.credentials.verify("s3cret-pass", created.admin.passwordHash),
      ).resolves.toBe(true);
    });

    it("should reject a duplicate name without creating a second partition", async () => {
      await ctx.lifecycle.create(acme);

      await expect(
        ctx.lifecycle.create({ ...acme, email: "other@acme.com" }),
      ).rejects.toMatchObject({ code: ErrorCode.DUPLICATE_NAME, statusCode: 400 });
      expect(ctx.repository.size()).toBe(1);
      expect(ctx.backend.partitionIds()).toEqual(["org_acme"]);
    });

    it("should reject an email registered to another organization", async () => {
      await ctx.lifecycle.create(acme);

      await expect(
        ctx.lifecycle.create({ ...acme, organizationName: "beta" }),
      ).rejects.toMatchObject({ code: ErrorCode.DUPLICATE_EMAIL });
      await expect(ctx.partitions.exists("org_beta")).resolves.toBe(false);
    });

    it("should validate the name before writing anything", async () => {
      await expect(
        ctx.lifecycle.create({ ...acme, organizationName: "a!" }),
      ).rejects.toMatchObject({ code: ErrorCode.INVALID_ORGANIZATION_NAME });
      expect(ctx.repository.size()).toBe(0);
      expect(ctx.backend.partitionIds()).toEqual([]);
    });

    it("should remove the registry row when the partition cannot be created", async () => {
      jest
        .spyOn(ctx.backend, "create")
        .mockRejectedValueOnce(new Error("connection reset"));

      await expect(ctx.lifecycle.create(acme)).rejects.toMatchObject({
        code: ErrorCode.PARTITION_OPERATION_FAILED,
      });
      await expect(ctx.repository.findByName("acme")).resolves.toBeNull();
      expect(ctx.backend.partitionIds()).toEqual([]);
    });

    it("should roll back when a stray partition already holds the id", async () => {
      await ctx.partitions.create("org_acme");

      await expect(ctx.lifecycle.create(acme)).rejects.toMatchObject({
        code: ErrorCode.PARTITION_EXISTS,
        statusCode: 409,
      });
      expect(ctx.repository.size()).toBe(0);
    });

    it("should surface the partition error even when the rollback fails", async () => {
      jest
        .spyOn(ctx.backend, "create")
        .mockRejectedValueOnce(new Error("connection reset"));
      jest
        .spyOn(ctx.repository, "delete")
        .mockRejectedValueOnce(new Error("registry offline"));

      await expect(ctx.lifecycle.create(acme)).rejects.toMatchObject({
        code: ErrorCode.PARTITION_OPERATION_FAILED,
      });

      const messages = consoleError.mock.calls.map((call) => String(call[0]));
      expect(
        messages.some((message) =>
          message.includes("Compensating action failed"),
        ),
      ).toBe(true);
    });
  });

  describe("get", () => {
    it("should look organizations up by normalized name", async () => {
      const created = await ctx.lifecycle.create(acme);
      const found = await ctx.lifecycle.get("  ACME ");
      expect(found.organization.id).toBe(created.id);
      expect(found.dataCount).toBe(0);
      expect(found.sample).toEqual([]);
    });

    it("should count the partition and return its first ten documents", async () => {
      await ctx.lifecycle.create(acme);
      const skus = Array.from({ length: 12 }, (_, i) => ({ sku: `a-${i + 1}` }));
      ctx.backend.insert("org_acme", ...skus);

      const found = await ctx.lifecycle.get("acme");

      expect(found.dataCount).toBe(12);
      expect(found.sample).toEqual(skus.slice(0, 10));
    });

    it("should fail with ORGANIZATION_NOT_FOUND for an unknown name", async () => {
      await expect(ctx.lifecycle.get("ghost")).rejects.toMatchObject({
        code: ErrorCode.ORGANIZATION_NOT_FOUND,
        statusCode: 404,
        message: "Organization 'ghost' not found",
      });
    });

    it("should reject an invalid name", async () => {
      await expect(ctx.lifecycle.get("no")).rejects.toMatchObject({
        code: ErrorCode.INVALID_ORGANIZATION_NAME,
      });
    });
  });

  describe("update", () => {
    beforeEach(async () => {
      await ctx.lifecycle.create(acme);
      ctx.backend.insert("org_acme", { sku: "a-1" }, { sku: "a-2" });
    });

    it("should rename the registry row and move the partition", async () => {
      const updated = await ctx.lifecycle.update("acme", {
        newOrganizationName: "Acme2",
      });

      expect(updated.name.value).toBe("acme2");
      expect(updated.partitionId).toBe("org_acme2");
      await expect(ctx.repository.findByName("acme")).resolves.toBeNull();
      expect(ctx.backend.partitionIds()).toEqual(["org_acme2"]);
      expect(ctx.backend.documents("org_acme2")).toEqual([
        { sku: "a-1" },
        { sku: "a-2" },
      ]);
    });

    it("should skip the partition rename when the name only differs in case", async () => {
      const rename = jest.spyOn(ctx.backend, "rename");

      const updated = await ctx.lifecycle.update("acme", {
        newOrganizationName: "ACME",
      });

      expect(updated.name.value).toBe("acme");
      expect(rename).not.toHaveBeenCalled();
    });

    it("should revert the registry when the partition rename fails", async () => {
      jest
        .spyOn(ctx.backend, "rename")
        .mockRejectedValueOnce(new Error("namespace locked"));

      await expect(
        ctx.lifecycle.update("acme", { newOrganizationName: "acme2" }),
      ).rejects.toMatchObject({ code: ErrorCode.PARTITION_OPERATION_FAILED });

      const reverted = await ctx.repository.findByName("acme");
      expect(reverted?.partitionId).toBe("org_acme");
      await expect(ctx.repository.findByName("acme2")).resolves.toBeNull();
      expect(ctx.backend.documents("org_acme")).toEqual([
        { sku: "a-1" },
        { sku: "a-2" },
      ]);
    });

    it("should revert the registry when the target partition is taken", async () => {
      await ctx.partitions.create("org_acme2");

      await expect(
        ctx.lifecycle.update("acme", { newOrganizationName: "acme2" }),
      ).rejects.toMatchObject({
        code: ErrorCode.PARTITION_TARGET_EXISTS,
        statusCode: 409,
      });
      await expect(ctx.repository.findByName("acme")).resolves.not.toBeNull();
      await expect(ctx.repository.findByName("acme2")).resolves.toBeNull();
    });

    it("should refuse to rename onto another organization", async () => {
      await ctx.lifecycle.create({
        organizationName: "beta",
        email: "admin@beta.com",
        password: "s3cret-pass",
      });

      await expect(
        ctx.lifecycle.update("acme", { newOrganizationName: "beta" }),
      ).rejects.toMatchObject({ code: ErrorCode.DUPLICATE_NAME });
      expect(ctx.backend.partitionIds()).toEqual(["org_acme", "org_beta"]);
    });

    it("should reject another organization's email before renaming", async () => {
      await ctx.lifecycle.create({
        organizationName: "beta",
        email: "admin@beta.com",
        password: "s3cret-pass",
      });
      const update = jest.spyOn(ctx.repository, "update");

      await expect(
        ctx.lifecycle.update("acme", {
          newOrganizationName: "gamma",
          email: "ADMIN@beta.com",
        }),
      ).rejects.toMatchObject({
        code: ErrorCode.DUPLICATE_EMAIL,
        message: "Email 'admin@beta.com' is already registered",
      });

      expect(update).not.toHaveBeenCalled();
      await expect(ctx.repository.findByName("acme")).resolves.not.toBeNull();
      await expect(ctx.repository.findByName("gamma")).resolves.toBeNull();
      expect(ctx.backend.partitionIds()).toEqual(["org_acme", "org_beta"]);
    });

    it("should accept the organization's own email with a rename", async () => {
      const updated = await ctx.lifecycle.update("acme", {
        newOrganizationName: "gamma",
        email: "admin@acme.com",
      });

      expect(updated.name.value).toBe("gamma");
      expect(updated.admin.email.value).toBe("admin@acme.com");
    });

    it("should change the admin email and password", async () => {
      const updated = await ctx.lifecycle.update("acme", {
        email: "owner@acme.com",
        password: "n3w-pass",
      });

      expect(updated.admin.email.value).toBe("owner@acme.com");
      await expect(
        ctx.credentials.verify("n3w-pass", updated.admin.passwordHash),
      ).resolves.toBe(true);
      await expect(
        ctx.credentials.verify("s3cret-pass", updated.admin.passwordHash),
      ).resolves.toBe(false);
    });

    it("should apply a rename and a credential change together", async () => {
      const updated = await ctx.lifecycle.update("acme", {
        newOrganizationName: "acme2",
        email: "owner@acme.com",
      });

      const stored = await ctx.repository.findByName("acme2");
      expect(updated.admin.email.value).toBe("owner@acme.com");
      expect(stored?.admin.email.value).toBe("owner@acme.com");
      expect(stored?.partitionId).toBe("org_acme2");
    });

    it("should validate every input before renaming", async () => {
      await expect(
        ctx.lifecycle.update("acme", {
          newOrganizationName: "acme2",
          email: "not-an-email",
        }),
      ).rejects.toMatchObject({ code: ErrorCode.INVALID_EMAIL });
      await expect(ctx.repository.findByName("acme")).resolves.not.toBeNull();
      expect(ctx.backend.partitionIds()).toEqual(["org_acme"]);
    });

    it("should return the current organization when nothing changes", async () => {
      const before = await ctx.repository.findByName("acme");
      const updated = await ctx.lifecycle.update("acme", {});
      expect(updated.updatedAt).toEqual(before?.updatedAt);
    });

    it("should fail with ORGANIZATION_NOT_FOUND for an unknown name", async () => {
      await expect(
        ctx.lifecycle.update("ghost", { newOrganizationName: "ghost2" }),
      ).rejects.toMatchObject({ code: ErrorCode.ORGANIZATION_NOT_FOUND });
    });
  });

  describe("delete", () => {
    beforeEach(async () => {
      await ctx.lifecycle.create(acme);
    });

    it("should drop the partition and the registry row", async () => {
      const token = await tokenFor("acme");

      const deleted = await ctx.lifecycle.delete("acme", token);

      expect(deleted.name.value).toBe("acme");
      await expect(ctx.repository.findByName("acme")).resolves.toBeNull();
      expect(ctx.backend.partitionIds()).toEqual([]);
    });

    it("should succeed when the partition is already gone", async () => {
      await ctx.partitions.drop("org_acme");
      const token = await tokenFor("acme");

      await ctx.lifecycle.delete("acme", token);
      await expect(ctx.repository.findByName("acme")).resolves.toBeNull();
    });

    it("should require a token", async () => {
      await expect(ctx.lifecycle.delete("acme", null)).rejects.toMatchObject({
        code: ErrorCode.UNAUTHORIZED,
        statusCode: 401,
        message: "Authentication token is required",
      });
      await expect(ctx.repository.findByName("acme")).resolves.not.toBeNull();
    });

    it("should check the token before the name", async () => {
      await expect(ctx.lifecycle.delete("!!", undefined)).rejects.toMatchObject({
        code: ErrorCode.UNAUTHORIZED,
      });
    });

    it("should reject an expired token", async () => {
      const organization = await ctx.repository.findByName("acme");
      const token = signExpiredToken(organization?.admin.id ?? "", "acme");

      await expect(ctx.lifecycle.delete("acme", token)).rejects.toMatchObject({
        code: ErrorCode.UNAUTHORIZED,
        message: "Token has expired",
        details: { reason: ErrorCode.TOKEN_EXPIRED },
      });
      expect(ctx.backend.partitionIds()).toEqual(["org_acme"]);
    });

    it("should reject a token signed with another secret", async () => {
      const token = signForeignToken("admin-x", "acme");

      await expect(ctx.lifecycle.delete("acme", token)).rejects.toMatchObject({
        code: ErrorCode.UNAUTHORIZED,
        message: "Invalid token",
      });
    });

    it("should reject a token issued to another organization", async () => {
      await ctx.lifecycle.create({
        organizationName: "beta",
        email: "admin@beta.com",
        password: "s3cret-pass",
      });
      const betaToken = await tokenFor("beta");

      await expect(ctx.lifecycle.delete("acme", betaToken)).rejects.toMatchObject({
        code: ErrorCode.UNAUTHORIZED,
        message: "You can only delete your own organization",
      });
      expect(ctx.backend.partitionIds()).toEqual(["org_acme", "org_beta"]);
    });

    it("should fail with ORGANIZATION_NOT_FOUND once already deleted", async () => {
      const token = await tokenFor("acme");
      await ctx.lifecycle.delete("acme", token);

      await expect(ctx.lifecycle.delete("acme", token)).rejects.toMatchObject({
        code: ErrorCode.ORGANIZATION_NOT_FOUND,
      });
    });

    it("should keep the registry row when the drop fails", async () => {
      const token = await tokenFor("acme");
      jest.spyOn(ctx.backend, "drop").mockRejectedValueOnce(new Error("busy"));

      await expect(ctx.lifecycle.delete("acme", token)).rejects.toMatchObject({
        code: ErrorCode.PARTITION_OPERATION_FAILED,
      });
      await expect(ctx.repository.findByName("acme")).resolves.not.toBeNull();
    });
  });
});
