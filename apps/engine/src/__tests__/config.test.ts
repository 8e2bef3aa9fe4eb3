import { describe, it } from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";

import { COGNITIVE_STATES_V1 } from "@cogwatch/contracts";
import { createStateClassifier, loadClassifierArtifact } from "../classifier/state_classifier";
import {
  computeConfigHash,
  loadEngineConfig,
  parseEngineConfig,
  resolveConfigPath,
  resolveRepoRoot,
} from "../config/ssot";
import { ConfigurationError } from "../errors";
import { testConfig } from "./helpers";

const REPO_ROOT = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../../..");

function isConfigError(code: string) {
  return (e: unknown) => e instanceof ConfigurationError && e.code === code;
}

function issuePaths(fn: () => unknown): string[] {
  try {
    fn();
  } catch (e: unknown) {
    if (e instanceof ConfigurationError) return e.issues.map((i) => i.path);
    throw e;
  }
  return [];
}

describe("engine config", () => {
  it("loads the shipped config and its classifier artifact agrees with it", () => {
    const loaded = loadEngineConfig({ repoRoot: REPO_ROOT });
    assert.deepEqual(loaded.config.states, [...COGNITIVE_STATES_V1]);
    assert.deepEqual(
      loaded.config.features.map((f) => f.name),
      [
        "tonic_pupil_level_30s",
        "grip_force_variability_15s",
        "tremor_trend_10s",
        "phasic_pupil_change_5s",
        "pupil_diameter_lag_5s",
      ]
    );
    assert.match(loaded.config_hash, /^sha256:[0-9a-f]{64}$/);

    const artifact = loadClassifierArtifact(resolveConfigPath(loaded, loaded.config.paths.classifier_artifact));
    const clf = createStateClassifier(artifact, {
      featureNames: loaded.config.features.map((f) => f.name),
      states: loaded.config.states,
    });
    assert.equal(clf.feature_names.length, 5);
  });

  it("reports a missing repo root as a configuration error", () => {
    const saved = process.env.COGWATCH_REPO_ROOT;
    delete process.env.COGWATCH_REPO_ROOT;
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "cogwatch-noroot-"));
    try {
      assert.throws(() => resolveRepoRoot(dir), isConfigError("CONFIG_MISSING"));
      assert.equal(resolveRepoRoot(path.join(REPO_ROOT, "apps", "engine")), REPO_ROOT);
    } finally {
      if (saved !== undefined) process.env.COGWATCH_REPO_ROOT = saved;
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it("hashes content, not key order", () => {
    assert.equal(computeConfigHash({ a: 1, b: [1, { c: 2, d: 3 }] }), computeConfigHash({ b: [1, { d: 3, c: 2 }], a: 1 }));
    assert.notEqual(computeConfigHash({ a: 1 }), computeConfigHash({ a: 2 }));
  });

  it("rejects a default speed outside the allowed set", () => {
    const base = testConfig();
    const bad = { ...base, playback: { ...base.playback, default_speed: 7 } };
    assert.throws(() => parseEngineConfig(bad), isConfigError("CONFIG_INVALID"));
    assert.deepEqual(
      issuePaths(() => parseEngineConfig(bad)),
      ["playback.default_speed"]
    );
  });

  it("rejects a feature over an unknown channel", () => {
    const base = testConfig();
    const bad = { ...base, features: [{ name: "z_mean5", kind: "mean", channel: "z", window: 5 }] };
    assert.deepEqual(
      issuePaths(() => parseEngineConfig(bad)),
      ["features.0.channel"]
    );
  });

  it("rejects unknown keys", () => {
    const bad = { ...testConfig(), extra: true };
    assert.throws(() => parseEngineConfig(bad), isConfigError("CONFIG_INVALID"));
  });

  it("reports a missing or unreadable file", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "cogwatch-config-"));
    try {
      assert.throws(() => loadEngineConfig({ file: path.join(dir, "absent.json") }), isConfigError("CONFIG_MISSING"));

      const broken = path.join(dir, "broken.json");
      fs.writeFileSync(broken, "{ not json");
      assert.throws(() => loadEngineConfig({ file: broken }), isConfigError("CONFIG_INVALID"));

      const good = path.join(dir, "engine.json");
      fs.writeFileSync(good, JSON.stringify(testConfig()));
      const loaded = loadEngineConfig({ file: good });
      assert.equal(loaded.repo_root, dir);
      assert.equal(resolveConfigPath(loaded, "model.json"), path.join(dir, "model.json"));
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
