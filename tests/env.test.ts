import { describe, it, expect, afterEach } from "vitest";
import { join } from "path";
import { defaultCacheLocation, homePath } from "../src/utils/env";

describe("Env Utils Tests", () => {
  const homeKey = process.platform === "win32" ? "USERPROFILE" : "HOME";
  const originalHome = process.env[homeKey];

  afterEach(() => {
    if (originalHome === undefined) {
      delete process.env[homeKey];
    } else {
      process.env[homeKey] = originalHome;
    }
  });

  it("should read the home directory from the environment", () => {
    process.env[homeKey] = join("home", "tester");
    expect(homePath()).toBe(join("home", "tester"));
    expect(defaultCacheLocation()).toBe(
      join("home", "tester", ".ignition", "fuel")
    );
  });

  it("should use an empty home component when it is unset", () => {
    delete process.env[homeKey];
    expect(homePath()).toBe("");
    expect(defaultCacheLocation()).toBe(join(".ignition", "fuel"));
  });
});
