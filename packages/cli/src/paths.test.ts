import { homedir } from "node:os";
import { describe, expect, it } from "vitest";
import { expandTildePath, getConfigPath, resolveSearchRoots } from "./paths.js";

describe("expandTildePath", () => {
  const home = homedir();

  it("expands ~/ at the start of the path", () => {
    expect(expandTildePath("~/.config/restrun")).toBe(`${home}/.config/restrun`);
  });

  it("uses the given home directory", () => {
    expect(expandTildePath("~/profiles", "/home/tester")).toBe("/home/tester/profiles");
  });

  it("leaves absolute and relative paths unchanged", () => {
    expect(expandTildePath("/etc/restrun")).toBe("/etc/restrun");
    expect(expandTildePath("relative/path")).toBe("relative/path");
  });

  it("leaves ~user and a tilde in the middle unchanged", () => {
    expect(expandTildePath("~backup/profiles")).toBe("~backup/profiles");
    expect(expandTildePath("/srv/~profiles")).toBe("/srv/~profiles");
  });

  it("handles tilde-only path", () => {
    expect(expandTildePath("~")).toBe(home);
  });
});

describe("getConfigPath", () => {
  it("defaults to ~/.config/restrun.toml", () => {
    expect(getConfigPath({})).toBe(`${homedir()}/.config/restrun.toml`);
  });

  it("honors RESTRUN_CONFIG", () => {
    expect(getConfigPath({ RESTRUN_CONFIG: "/etc/restrun.toml" })).toBe("/etc/restrun.toml");
  });
});

describe("resolveSearchRoots", () => {
  it("returns the user root before the system root", () => {
    expect(resolveSearchRoots(undefined, "/home/tester")).toEqual(["/home/tester/.config/restrun", "/etc/restrun"]);
  });
});
