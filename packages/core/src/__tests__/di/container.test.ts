import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";

import {
  CONFIG_TOKEN,
  PERSONAS_PATH_TOKEN,
  PERSONA_SOURCE_TOKEN,
  container,
  initContainer,
  isContainerInitialized,
  resetContainer,
} from "../../di/container.js";
import { JsonFilePersonaSource } from "../../persona/loader.js";
import { IChatcastConfig } from "../../types.js";

describe("DI Container", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "chatcast-di-test-"));
    resetContainer();
  });

  afterEach(() => {
    resetContainer();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("should register the config token", () => {
    expect(isContainerInitialized()).toBe(false);

    initContainer(tmpDir);

    expect(isContainerInitialized()).toBe(true);
    const config = container.resolve<IChatcastConfig>(CONFIG_TOKEN);
    expect(config.server.port).toBe(7676);
  });

  it("should resolve the persona catalog path against the project directory", () => {
    initContainer(tmpDir);

    expect(container.resolve<string>(PERSONAS_PATH_TOKEN)).toBe(path.join(tmpDir, "personas.json"));
  });

  it("should resolve the persona source as a singleton", () => {
    initContainer(tmpDir);

    const a = container.resolve<JsonFilePersonaSource>(PERSONA_SOURCE_TOKEN);
    const b = container.resolve<JsonFilePersonaSource>(PERSONA_SOURCE_TOKEN);

    expect(a).toBeInstanceOf(JsonFilePersonaSource);
    expect(a).toBe(b);
    expect(a.path).toBe(path.join(tmpDir, "personas.json"));
  });

  it("should be idempotent: calling initContainer twice keeps the first registration", () => {
    initContainer(tmpDir);
    const first = container.resolve<IChatcastConfig>(CONFIG_TOKEN);

    initContainer(tmpDir);

    expect(container.resolve<IChatcastConfig>(CONFIG_TOKEN)).toBe(first);
  });
});
