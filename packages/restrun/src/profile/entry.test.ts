import { realpathSync } from "node:fs";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createProfileTree, type EntryContent, type ProfileTree } from "../../../testing/src/index.js";
import { ConfigError } from "../core/errors.js";
import { loadCommandSchema } from "../schema/command-schema.js";
import { decodeEntry, directiveFlag, parseEntryName, readEntryLines } from "./entry.js";

const schema = loadCommandSchema();

describe("parseEntryName", () => {
  it("reads a plain flag", () => {
    expect(parseEntryName("verbose", schema)).toEqual({
      scope: undefined,
      negated: false,
      flag: "verbose",
      values: [],
    });
  });

  it("reads scope, flag and values", () => {
    expect(parseEntryName("backup_tag_taga_tagb", schema)).toEqual({
      scope: "backup",
      negated: false,
      flag: "tag",
      values: ["taga", "tagb"],
    });
  });

  it("reads a scoped negation", () => {
    expect(parseEntryName("backup_no_verbose", schema)).toEqual({
      scope: "backup",
      negated: true,
      flag: "verbose",
      values: [],
    });
  });

  it("reads an unscoped negation", () => {
    expect(parseEntryName("no_with-atime", schema)).toMatchObject({
      scope: undefined,
      negated: true,
      flag: "with-atime",
    });
  });

  it("treats a command name followed by a value as a flag", () => {
    // tag is both a command and a flag
    expect(parseEntryName("tag_taga", schema)).toEqual({
      scope: undefined,
      negated: false,
      flag: "tag",
      values: ["taga"],
    });
  });

  it("scopes a command that is also a flag when a flag follows", () => {
    expect(parseEntryName("tag_add_one", schema)).toEqual({
      scope: "tag",
      negated: false,
      flag: "add",
      values: ["one"],
    });
  });

  it("scopes hook scripts", () => {
    expect(parseEntryName("init_pre", schema)).toMatchObject({ scope: "init", flag: "pre" });
  });

  it("keeps 'no' as the flag name when an unknown name follows", () => {
    expect(parseEntryName("no_with-atim", schema)).toEqual({
      scope: undefined,
      negated: false,
      flag: "no",
      values: ["with-atim"],
    });
  });

  it("keeps a lone 'no' as the flag name", () => {
    expect(parseEntryName("no", schema)).toMatchObject({ negated: false, flag: "no" });
  });

  it("rejects empty segments", () => {
    expect(() => parseEntryName("tag__a", schema)).toThrow(ConfigError);
    expect(() => parseEntryName("tag_", schema)).toThrow('has an empty \'_\' segment');
  });
});

describe("decodeEntry", () => {
  let tree: ProfileTree;
  let dir: string;

  beforeEach(() => {
    tree = createProfileTree();
    dir = tree.define("main");
  });

  afterEach(() => {
    tree.cleanup();
  });

  const decode = (name: string, content: EntryContent) => {
    const path = tree.write(dir, name, content);
    const isSymbolicLink = content !== null && typeof content === "object" && "symlink" in content;
    return decodeEntry({ name, path, isSymbolicLink }, schema);
  };

  it("reads values from the file, one per line", () => {
    expect(decode("host", "alpha\n\n  beta  \n# comment\n")).toEqual({
      type: "flag",
      flag: "host",
      values: ["alpha", "beta"],
      scope: undefined,
      source: "host",
      path: join(dir, "host"),
    });
  });

  it("decodes an empty file as a valueless flag", () => {
    expect(decode("host", null)).toMatchObject({ type: "flag", flag: "host", values: [] });
  });

  it("decodes nothing from a file with only comments or blank lines", () => {
    expect(decode("exclude", "# nothing yet\n")).toBeUndefined();
    expect(decode("tag", "\n")).toBeUndefined();
  });

  it("reads values from the file name when the file is empty", () => {
    expect(decode("backup_tag_taga_tagb", null)).toMatchObject({
      type: "flag",
      flag: "tag",
      values: ["taga", "tagb"],
      scope: "backup",
    });
  });

  it("rejects values in both the name and the file", () => {
    expect(() => decode("verbose_3", "4\n")).toThrow("must be empty when the file name holds values");
  });

  it("decodes an empty boolean marker", () => {
    expect(decode("with-atime", null)).toMatchObject({ type: "flag", flag: "with-atime", values: [] });
  });

  it("rejects values on a boolean flag", () => {
    expect(() => decode("with-atime_yes", null)).toThrow('"with-atime" is a switch and takes no values');
  });

  it("uses the entry path for content-reference flags", () => {
    expect(decode("exclude-file", "*.tmp\n")).toMatchObject({
      type: "flag",
      flag: "exclude-file",
      values: [join(dir, "exclude-file")],
    });
  });

  it("follows symbolic links for content-reference flags", () => {
    const secret = tree.path("secret");
    tree.write(tree.base, "secret", "test-secret\n");

    expect(decode("password-file", { symlink: secret })).toMatchObject({
      values: [realpathSync(secret)],
    });
  });

  it("rejects a dangling symbolic link", () => {
    expect(() => decode("password-file", { symlink: tree.path("missing") })).toThrow(
      "dangling symbolic link",
    );
  });

  it("rejects values on a content-reference flag", () => {
    expect(() => decode("exclude-file_x", null)).toThrow("refers to the file itself");
  });

  it("decodes a negation", () => {
    expect(decode("backup_no_verbose", null)).toEqual({
      type: "negation",
      flag: "verbose",
      scope: "backup",
      source: "backup_no_verbose",
      path: join(dir, "backup_no_verbose"),
    });
  });

  it("rejects a negation with values", () => {
    expect(() => decode("no_tag_a", null)).toThrow('negation of "tag" takes no values');
  });

  it("rejects negated inherit", () => {
    expect(() => decode("no_inherit", null)).toThrow("inherit cannot be negated");
  });

  it("decodes inherit from the file name", () => {
    expect(decode("inherit_profile repo", null)).toMatchObject({
      type: "inherit",
      profiles: ["profile repo"],
    });
  });

  it("decodes inherit from the file content", () => {
    expect(decode("inherit", "base\nremote\n")).toMatchObject({
      type: "inherit",
      profiles: ["base", "remote"],
    });
  });

  it("rejects an inherit naming no profile", () => {
    expect(() => decode("inherit", "# nothing\n")).toThrow("inherit names no profile");
  });

  it("decodes scripts", () => {
    expect(decode("init_pre", { script: "#!/bin/sh\nexit 0\n" })).toEqual({
      type: "script",
      hook: "pre",
      script: join(dir, "init_pre"),
      scope: "init",
      source: "init_pre",
      path: join(dir, "init_pre"),
    });
  });

  it("rejects values on scripts", () => {
    expect(() => decode("post_x", null)).toThrow('"post" takes no values in the file name');
  });

  it("keeps unknown flags as flag directives", () => {
    expect(decode("frobnicate", "1\n")).toMatchObject({ type: "flag", flag: "frobnicate", values: ["1"] });
  });

  it("reports the entry path on errors", () => {
    expect(() => decode("tag__a", null)).toThrow(`${join(dir, "tag__a")}: file name "tag__a"`);
  });
});

describe("readEntryLines", () => {
  it("handles CRLF line endings", () => {
    const tree = createProfileTree();
    try {
      const path = tree.write(tree.define("p"), "host", "a\r\nb\r\n");
      expect(readEntryLines({ name: "host", path, isSymbolicLink: false })).toEqual(["a", "b"]);
    } finally {
      tree.cleanup();
    }
  });
});

describe("directiveFlag", () => {
  it("names the flag each directive touches", () => {
    expect(directiveFlag({ type: "inherit", profiles: ["a"], source: "inherit", path: "/p/inherit" })).toBe(
      "inherit",
    );
    expect(directiveFlag({ type: "script", hook: "post", script: "/p/post", source: "post", path: "/p/post" })).toBe(
      "post",
    );
    expect(directiveFlag({ type: "negation", flag: "tag", source: "no_tag", path: "/p/no_tag" })).toBe("tag");
  });
});
