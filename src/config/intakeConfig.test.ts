import { DEFAULT_STAGE_THRESHOLDS } from "../intake/flow/intakeStageMachine";
import { IntakeConfigError, loadIntakeConfig } from "./intakeConfig";

describe("loadIntakeConfig", () => {
  it("applies defaults for an empty environment", () => {
    const config = loadIntakeConfig({});

    expect(config).toEqual({
      port: 3000,
      logLevel: "info",
      databaseUrl: null,
      databaseUrlSource: null,
      rulesPath: "config/bottleneckRules.yaml",
      topN: 3,
      defaultTier: "growth",
      bottleneckDedup: "by_name",
      stageThresholds: DEFAULT_STAGE_THRESHOLDS,
    });
    expect(Object.isFrozen(config)).toBe(true);
  });

  it("treats blank values as unset", () => {
    const config = loadIntakeConfig({ PORT: "", DATABASE_URL: "  ", INTAKE_TOP_N: "" });

    expect(config.port).toBe(3000);
    expect(config.databaseUrl).toBeNull();
    expect(config.topN).toBe(3);
  });

  it("prefers the primary database URL over the backup", () => {
    expect(
      loadIntakeConfig({
        DATABASE_URL: "postgres://primary/intake",
        DATABASE_URL_BACKUP: "postgres://backup/intake",
      })
    ).toMatchObject({ databaseUrl: "postgres://primary/intake", databaseUrlSource: "primary" });

    expect(
      loadIntakeConfig({ DATABASE_URL_BACKUP: "postgres://backup/intake" })
    ).toMatchObject({ databaseUrl: "postgres://backup/intake", databaseUrlSource: "backup" });
  });

  it("reads stage thresholds and policies from the environment", () => {
    const config = loadIntakeConfig({
      INTAKE_DISCOVERY_MIN_INFORMATIVE: "3",
      INTAKE_DISCOVERY_MAX_TURNS: "6",
      INTAKE_BOTTLENECK_DEDUP: "additive",
      INTAKE_DEFAULT_TIER: "enterprise",
    });

    expect(config.stageThresholds.discovery).toEqual({ minInformativeExchanges: 3, maxTurns: 6 });
    expect(config.stageThresholds.opening).toEqual(DEFAULT_STAGE_THRESHOLDS.opening);
    expect(config.bottleneckDedup).toBe("additive");
    expect(config.defaultTier).toBe("enterprise");
  });

  it("rejects invalid values with the offending keys", () => {
    expect(() => loadIntakeConfig({ INTAKE_TOP_N: "zero" })).toThrow(IntakeConfigError);
    expect(() => loadIntakeConfig({ INTAKE_OPENING_MAX_TURNS: "0" })).toThrow(
      /INTAKE_OPENING_MAX_TURNS/
    );
    expect(() => loadIntakeConfig({ INTAKE_BOTTLENECK_DEDUP: "merge" })).toThrow(
      /INTAKE_BOTTLENECK_DEDUP/
    );
  });
});
