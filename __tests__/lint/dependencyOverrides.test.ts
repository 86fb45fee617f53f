/**
 * Dependency Override Tests
 */

import { describe, it, expect } from "vitest";
import { installOverrides } from "../../src/lint/dependencyOverrides.js";
import { DependencyOverrideError } from "../../src/types/errors.js";
import { createFakeExecutor } from "../helpers/fakeExecutor.js";

describe("installOverrides", () => {
  it("should do nothing for a blank override", async () => {
    const fake = createFakeExecutor();

    const packages = await installOverrides("  ", { cwd: "/work", executor: fake.executor });

    expect(packages).toEqual([]);
    expect(fake.calls).toEqual([]);
  });

  it("should install the packages and then run pip check", async () => {
    const fake = createFakeExecutor();

    const packages = await installOverrides("ansible-lint==6.22.2 ansible-core==2.16.0", {
      cwd: "/work",
      executor: fake.executor,
    });

    expect(packages).toEqual(["ansible-lint==6.22.2", "ansible-core==2.16.0"]);
    expect(fake.calls.map(({ command, args }) => [command, ...args])).toEqual([
      ["pip", "install", "ansible-lint==6.22.2", "ansible-core==2.16.0"],
      ["pip", "check"],
    ]);
  });

  it("should stop when pip install fails", async () => {
    const fake = createFakeExecutor(() => ({ exitCode: 1, output: "No matching distribution" }));

    await expect(
      installOverrides("ansible-lint==0.0.0", { cwd: "/work", executor: fake.executor })
    ).rejects.toMatchObject({
      name: "DependencyOverrideError",
      step: "install",
      stepExitCode: 1,
      output: "No matching distribution",
    });
    expect(fake.calls).toHaveLength(1);
  });

  it("should fail when pip check reports conflicts", async () => {
    const fake = createFakeExecutor((_command, args) =>
      args[0] === "check" ? { exitCode: 1, output: "ansible-lint has requirement" } : { exitCode: 0 }
    );

    const attempt = installOverrides("ansible-core==2.12.0", {
      cwd: "/work",
      executor: fake.executor,
      pip: "pip3",
    });

    await expect(attempt).rejects.toBeInstanceOf(DependencyOverrideError);
    await expect(attempt).rejects.toThrow("pip check failed with exit code 1");
    expect(fake.calls.map((call) => call.command)).toEqual(["pip3", "pip3"]);
  });
});
