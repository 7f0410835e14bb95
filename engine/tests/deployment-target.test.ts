/**
 * Compile-CAR Engine — Deployment Target Tests
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import {
  extractDeploymentTarget,
  resolveMinimumDeploymentTarget,
  MAC_SDK_CONFIG_PATH,
} from "../src/deployment-target";
import { ConfigError } from "../src/errors";

const SAMPLE_GNI = `# Minimum supported version of macOS.
declare_args() {
  mac_deployment_target = "12.0"

  mac_min_system_version = "12.0"

  mac_sdk_min = "15.0"
}
`;

describe("extractDeploymentTarget", () => {
  it("reads the assigned value", () => {
    expect(extractDeploymentTarget(SAMPLE_GNI, "mac_sdk.gni")).toBe("12.0");
  });

  it("ignores a trailing comment", () => {
    const text = '  mac_deployment_target = "11.0"  # Keep in sync with Info.plist\n';
    expect(extractDeploymentTarget(text, "mac_sdk.gni")).toBe("11.0");
  });

  it("allows no spaces around the equals sign", () => {
    expect(extractDeploymentTarget('mac_deployment_target="13.3"', "x")).toBe("13.3");
  });

  it("does not match similarly named keys", () => {
    const text = 'mac_deployment_target_override = "10.15"\nmac_deployment_target = "12.0"\n';
    expect(extractDeploymentTarget(text, "x")).toBe("12.0");
  });

  it("fails when the assignment is missing", () => {
    expect(() => extractDeploymentTarget('mac_sdk_min = "15.0"\n', "mac_sdk.gni")).toThrow(
      "No mac_deployment_target assignment found in mac_sdk.gni",
    );
  });

  it("fails when the assignment appears twice", () => {
    const text = 'mac_deployment_target = "12.0"\nmac_deployment_target = "13.0"\n';
    expect(() => extractDeploymentTarget(text, "mac_sdk.gni")).toThrow(
      "Found 2 mac_deployment_target assignments in mac_sdk.gni; expected exactly one",
    );
  });

  it("does not match a commented-out assignment", () => {
    const text = '# mac_deployment_target = "10.0"\nmac_deployment_target = "12.0"\n';
    expect(extractDeploymentTarget(text, "x")).toBe("12.0");
  });

  it("throws ConfigError", () => {
    expect(() => extractDeploymentTarget("", "x")).toThrow(ConfigError);
  });
});

describe("resolveMinimumDeploymentTarget", () => {
  let sourceRoot: string;

  beforeEach(() => {
    sourceRoot = fs.mkdtempSync(path.join(os.tmpdir(), "compile-car-target-"));
  });

  afterEach(() => {
    fs.rmSync(sourceRoot, { recursive: true, force: true });
  });

  it("reads build/config/mac/mac_sdk.gni under the source root", () => {
    const configPath = path.join(sourceRoot, MAC_SDK_CONFIG_PATH);
    fs.mkdirSync(path.dirname(configPath), { recursive: true });
    fs.writeFileSync(configPath, SAMPLE_GNI);

    expect(resolveMinimumDeploymentTarget(sourceRoot)).toBe("12.0");
  });

  it("fails with ConfigError when the file is missing", () => {
    expect(() => resolveMinimumDeploymentTarget(sourceRoot)).toThrow(ConfigError);
    expect(() => resolveMinimumDeploymentTarget(sourceRoot)).toThrow(
      `Cannot read build configuration ${path.join(sourceRoot, MAC_SDK_CONFIG_PATH)}`,
    );
  });
});
