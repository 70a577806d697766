import express from "express";
import request from "supertest";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createAdminRouter } from "../../src/routes/admin.js";
import { SAMPLE_DOCUMENT, createHarness, removeTempDir, type CoordinatorHarness } from "../helpers/coordinator.js";

describe("admin api", () => {
  let harness: CoordinatorHarness;
  let app: ReturnType<typeof express>;

  beforeEach(async () => {
    harness = createHarness();
    await harness.coordinator.createFromUpload({
      originalName: "energy.txt",
      buffer: Buffer.from(SAMPLE_DOCUMENT, "utf8")
    });

    app = express();
    app.use("/api/admin", createAdminRouter({ coordinator: harness.coordinator }));
  });

  afterEach(async () => {
    await removeTempDir(harness.uploadsDir);
  });

  it("keeps sessions younger than the default age", async () => {
    const response = await request(app).post("/api/admin/cleanup");

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ deletedSessions: 0, message: "Deleted 0 sessions older than 30 days" });
    expect(harness.store.sessionExists("chat_1")).toBe(true);
  });

  it("deletes sessions older than the given age", async () => {
    harness.store.createSession({
      id: "chat_old",
      title: "old.txt",
      createdAt: new Date(Date.now() - 10 * 24 * 60 * 60 * 1000)
    });

    const response = await request(app).post("/api/admin/cleanup").query({ daysOld: 7 });

    expect(response.body).toEqual({ deletedSessions: 1, message: "Deleted 1 sessions older than 7 days" });
    expect(harness.store.sessionExists("chat_old")).toBe(false);
    expect(harness.store.sessionExists("chat_1")).toBe(true);
  });

  it("rejects a negative age", async () => {
    const response = await request(app).post("/api/admin/cleanup").query({ daysOld: -1 });

    expect(response.status).toBe(400);
  });
});
