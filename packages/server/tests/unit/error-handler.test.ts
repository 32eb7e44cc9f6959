import { afterEach, describe, expect, it } from "vitest";
import type { FastifyInstance } from "fastify";
import { InferenceTimeoutError, ValidationError } from "../../src/errors.js";
import { resolveConfig } from "../../src/startup/config.js";
import { createHttpServer } from "../../src/startup/http-server.js";

async function serverThrowing(error: Error, nodeEnv: string) {
  const fastify = await createHttpServer(
    resolveConfig({ TEMP_DIR: "/tmp/unused", NODE_ENV: nodeEnv }),
  );
  fastify.get("/boom", async () => {
    throw error;
  });
  return fastify;
}

describe("error handler", () => {
  let fastify: FastifyInstance | undefined;

  afterEach(async () => {
    await fastify?.close();
    fastify = undefined;
  });

  it("answers validation errors with 400 and their message", async () => {
    fastify = await serverThrowing(new ValidationError("No filename provided"), "test");
    const response = await fastify.inject({ method: "GET", url: "/boom" });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({ detail: "No filename provided" });
  });

  it("answers service failures with 500 and their message", async () => {
    fastify = await serverThrowing(new InferenceTimeoutError(1000), "production");
    const response = await fastify.inject({ method: "GET", url: "/boom" });

    expect(response.statusCode).toBe(500);
    expect(response.json()).toEqual({
      detail: "Inference timed out after 1000ms",
    });
  });

  it("shows unexpected error messages outside production", async () => {
    fastify = await serverThrowing(new Error("disk full"), "development");
    const response = await fastify.inject({ method: "GET", url: "/boom" });

    expect(response.statusCode).toBe(500);
    expect(response.json()).toEqual({ detail: "disk full" });
  });

  it("hides unexpected error messages in production", async () => {
    fastify = await serverThrowing(new Error("disk full"), "production");
    const response = await fastify.inject({ method: "GET", url: "/boom" });

    expect(response.statusCode).toBe(500);
    expect(response.json()).toEqual({ detail: "Internal server error" });
  });
});
