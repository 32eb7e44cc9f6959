import { describe, expect, it } from "vitest";
import { resolveConfig } from "../../src/startup/config.js";

describe("resolveConfig", () => {
  it("applies defaults", () => {
    expect(resolveConfig({}, "/srv/app")).toEqual({
      port: 8000,
      host: "0.0.0.0",
      tempDir: "/srv/app/temp_3d",
      supportedFormats: ["jpg", "jpeg", "png", "webp", "bmp"],
      maxUploadBytes: 10485760,
      modelId: "tencent/Hunyuan3D-2",
      pipelineModule: undefined,
      inferenceTimeoutMs: 600000,
      corsOrigins: ["*"],
      nodeEnv: "development",
    });
  });

  it("reads overrides from the environment", () => {
    const config = resolveConfig(
      {
        PORT: "9000",
        HOST: "127.0.0.1",
        TEMP_DIR: "/var/tmp/mesh",
        SUPPORTED_FORMATS: " .PNG, jpg ,",
        MAX_UPLOAD_BYTES: "2048",
        MODEL_ID: "test/model",
        INFERENCE_TIMEOUT_MS: "1500",
        CORS_ORIGIN: "http://a.test, http://b.test",
        NODE_ENV: "production",
      },
      "/srv/app",
    );

    expect(config.port).toBe(9000);
    expect(config.host).toBe("127.0.0.1");
    expect(config.tempDir).toBe("/var/tmp/mesh");
    expect(config.supportedFormats).toEqual(["png", "jpg"]);
    expect(config.maxUploadBytes).toBe(2048);
    expect(config.modelId).toBe("test/model");
    expect(config.inferenceTimeoutMs).toBe(1500);
    expect(config.corsOrigins).toEqual(["http://a.test", "http://b.test"]);
    expect(config.nodeEnv).toBe("production");
  });

  it("resolves relative paths against the working directory", () => {
    const config = resolveConfig(
      { TEMP_DIR: "staging", PIPELINE_MODULE: "./pipelines/mesh.mjs" },
      "/srv/app",
    );
    expect(config.tempDir).toBe("/srv/app/staging");
    expect(config.pipelineModule).toBe("/srv/app/pipelines/mesh.mjs");
  });

  it("leaves package specifiers for the pipeline module untouched", () => {
    const config = resolveConfig({ PIPELINE_MODULE: "mesh-pipeline" }, "/srv/app");
    expect(config.pipelineModule).toBe("mesh-pipeline");
  });

  it("rejects malformed numbers", () => {
    expect(() => resolveConfig({ PORT: "abc" })).toThrow(
      'Expected a positive integer, got "abc"',
    );
    expect(() => resolveConfig({ MAX_UPLOAD_BYTES: "0" })).toThrow(
      'Expected a positive integer, got "0"',
    );
  });
});
