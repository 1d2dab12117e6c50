/**
 * Admin Login Integration Tests
 */

import request from "supertest";
import { TestContext, createTestContext } from "../utils/test-helpers";

describe("POST /admin/login", () => {
  let ctx: TestContext;

  beforeEach(async () => {
    ctx = createTestContext();
    await ctx.lifecycle.create({
      organizationName: "acme",
      email: "admin@acme.com",
      password: "s3cret-pass",
    });
  });

  it("should return a bearer token for valid credentials", async () => {
    const res = await request(ctx.app)
      .post("/admin/login")
      .send({ email: "admin@acme.com", password: "s3cret-pass" });

    expect(res.status).toBe(200);
    expect(res.body.success).toBe(true);
    expect(res.body.data).toMatchObject({
      token_type: "bearer",
      expires_in: 1800,
      organization_name: "acme",
    });
    expect(typeof res.body.data.access_token).toBe("string");
  });

  it("should not reveal whether the email exists", async () => {
    const wrongPassword = await request(ctx.app)
      .post("/admin/login")
      .send({ email: "admin@acme.com", password: "wrong-pass" });
    const unknownEmail = await request(ctx.app)
      .post("/admin/login")
      .send({ email: "nobody@acme.com", password: "wrong-pass" });

    expect(wrongPassword.status).toBe(401);
    expect(unknownEmail.status).toBe(401);
    expect(unknownEmail.body).toEqual(wrongPassword.body);
    expect(wrongPassword.body).toEqual({
      success: false,
      error: { message: "Invalid email or password", code: "INVALID_CREDENTIALS" },
    });
  });

  it("should let an admin log in with any address accepted at registration", async () => {
    await request(ctx.app).post("/org/create").send({
      organization_name: "bang",
      email: "first!last@bang.com",
      password: "s3cret-pass",
    });

    const res = await request(ctx.app)
      .post("/admin/login")
      .send({ email: "first!last@bang.com", password: "s3cret-pass" });

    expect(res.status).toBe(200);
    expect(res.body.data.organization_name).toBe("bang");
  });

  it("should answer a malformed email like an unknown one", async () => {
    const res = await request(ctx.app)
      .post("/admin/login")
      .send({ email: "admin", password: "s3cret-pass" });

    expect(res.status).toBe(401);
    expect(res.body.error).toEqual({
      message: "Invalid email or password",
      code: "INVALID_CREDENTIALS",
    });
  });

  it("should reject an empty email with 400", async () => {
    const res = await request(ctx.app)
      .post("/admin/login")
      .send({ email: "", password: "s3cret-pass" });

    expect(res.status).toBe(400);
    expect(res.body.error.details).toEqual([
      { field: "email", message: "email is required" },
    ]);
  });
});
