import express from "express";
import request from "supertest";
import { describe, expect, it } from "vitest";
import { z } from "zod";
import { validate } from "../../../src/middleware/validator.js";

function createApp() {
  const app = express();
  app.use(express.json());
  app.post(
    "/items/:id",
    validate({
      params: z.object({ id: z.string().regex(/^\d+$/) }),
      query: z.object({ limit: z.coerce.number().int().min(1).default(10) }),
      body: z.object({ name: z.string().min(1) })
    }),
    (req, res) => {
      res.json({ params: req.params, query: req.query, body: req.body });
    }
  );
  return app;
}

describe("validate middleware", () => {
  it("replaces request parts with parsed values", async () => {
    const response = await request(createApp()).post("/items/7").send({ name: "lamp", extra: true });

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ params: { id: "7" }, query: { limit: 10 }, body: { name: "lamp" } });
  });

  it("reports every failing part in one response", async () => {
    const response = await request(createApp()).post("/items/abc").query({ limit: 0 }).send({ name: "" });

    expect(response.status).toBe(400);
    expect(response.body.error).toBe("Validation failed");
    expect(
      response.body.details.map((detail: { location: string; path: string }) => `${detail.location}:${detail.path}`)
    ).toEqual(["params:id", "query:limit", "body:name"]);
  });
});
