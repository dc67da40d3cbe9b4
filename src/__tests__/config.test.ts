import { DEFAULT_CONFIG, loadEngineConfig, validateEngineConfig } from "../config";
import { ConfigurationError } from "../errors";
import { createEngineLogger } from "../logger";
import { createEngineMetrics } from "../metrics";

describe("Config", function () {
  describe("loadEngineConfig", function () {
    it("Should fall back to defaults", function () {
      expect(loadEngineConfig({})).toEqual({ ...DEFAULT_CONFIG, logFile: undefined });
    });

    it("Should read every variable", function () {
      const config = loadEngineConfig({
        NODE_ENV: "staging",
        LOG_LEVEL: "DEBUG",
        ENGINE_LOG_FILE: "engine.log",
        ENGINE_METRICS_PREFIX: "lending_",
        ENGINE_COLLECT_DEFAULT_METRICS: "true",
      });
      expect(config).toEqual({
        environment: "staging",
        logLevel: "debug",
        logFile: "engine.log",
        metricsPrefix: "lending_",
        collectDefaultMetrics: true,
      });
    });

    it("Should reject an unknown log level", function () {
      expect(() => loadEngineConfig({ LOG_LEVEL: "loud" })).toThrow(ConfigurationError);
    });

    it("Should reject an invalid metric prefix", function () {
      expect(() => loadEngineConfig({ ENGINE_METRICS_PREFIX: "9-bad" })).toThrow(
        'ENGINE_METRICS_PREFIX "9-bad" is not a valid metric name prefix',
      );
    });
  });

  describe("validateEngineConfig", function () {
    it("Should accept the defaults", function () {
      expect(() => validateEngineConfig(DEFAULT_CONFIG)).not.toThrow();
    });

    it("Should allow an empty metric prefix", function () {
      expect(() => validateEngineConfig({ ...DEFAULT_CONFIG, metricsPrefix: "" })).not.toThrow();
    });

    it("Should reject silly logging in production", function () {
      expect(() => validateEngineConfig({ ...DEFAULT_CONFIG, environment: "production", logLevel: "silly" })).toThrow(
        "LOG_LEVEL=silly is not allowed in production",
      );
    });
  });

  describe("createEngineLogger", function () {
    it("Should be silent under test", function () {
      const logger = createEngineLogger("engine", { ...DEFAULT_CONFIG, logLevel: "debug" });
      expect(logger.silent).toBe(true);
      expect(logger.level).toBe("debug");
    });
  });

  describe("createEngineMetrics", function () {
    it("Should register every metric under the configured prefix", async function () {
      const metrics = createEngineMetrics({ metricsPrefix: "test_", collectDefaultMetrics: false });
      const names = (await metrics.register.getMetricsAsJSON()).map((m) => m.name).sort();
      expect(names).toEqual([
        "test_liquidations_total",
        "test_operation_duration_seconds",
        "test_operations_total",
        "test_stale_price_rejections_total",
      ]);
    });

    it("Should keep separate engines in separate registries", function () {
      const a = createEngineMetrics();
      const b = createEngineMetrics();
      a.operationsTotal.inc({ operation: "mintDebt", status: "success" });
      expect(a.register).not.toBe(b.register);
    });
  });
});
